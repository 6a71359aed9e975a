import { describe, it, expect } from 'vitest';
import { formatDateRange, formatTimestamp, isDateInRange, toIsoDate } from '../src/dates';

describe('dates', () => {
  it('builds ISO dates from the zero-based calendar month', () => {
    expect(toIsoDate('2024', '0', '5')).toBe('2024-01-05');
    expect(toIsoDate('2024', '11', '31')).toBe('2024-12-31');
  });

  it('rejects values that are not calendar parts', () => {
    expect(toIsoDate('2024', '12', '1')).toBeNull();
    expect(toIsoDate('2024', '3', 'x')).toBeNull();
  });

  it('checks ranges inclusively', () => {
    expect(isDateInRange('2024-03-20', '2024-03-20', '2024-12-31')).toBe(true);
    expect(isDateInRange('2024-12-31', '2024-03-20', '2024-12-31')).toBe(true);
    expect(isDateInRange('2024-03-19', '2024-03-20', '2024-12-31')).toBe(false);
    expect(isDateInRange('2025-01-01', '2024-03-20', '2024-12-31')).toBe(false);
    expect(isDateInRange('2030-01-01', '2024-03-20', '')).toBe(true);
  });

  it('formats display strings', () => {
    expect(formatDateRange('2024-03-20', '2024-12-31')).toBe('2024-03-20 ~ 2024-12-31');
    expect(formatTimestamp(new Date(2024, 2, 5, 7, 8, 9))).toBe('20240305_070809');
  });
});
