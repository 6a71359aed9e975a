function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Builds YYYY-MM-DD from the calendar's year, zero-based month and day number. */
export function toIsoDate(year: string, monthIndex: string, day: string): string | null {
  const y = Number(year);
  const m = Number(monthIndex);
  const d = Number(day);
  if (!Number.isInteger(y) || !Number.isInteger(m) || !Number.isInteger(d)) {
    return null;
  }
  if (m < 0 || m > 11 || d < 1 || d > 31) {
    return null;
  }

  return `${y}-${pad(m + 1)}-${pad(d)}`;
}

/** Inclusive on both ends. Empty bounds are open. */
export function isDateInRange(date: string, startDate: string, endDate: string): boolean {
  if (startDate && date < startDate) {
    return false;
  }
  if (endDate && date > endDate) {
    return false;
  }
  return true;
}

export function formatDateRange(startDate: string, endDate: string): string {
  return `${startDate} ~ ${endDate}`;
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
