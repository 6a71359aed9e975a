/** Allows at most one event per interval, measured from the last one let through. */
export class NotificationThrottle {
  private lastSentAt: number | null = null;
  private readonly intervalMs: number;
  private readonly now: () => number;

  constructor(intervalMs: number, now: () => number = Date.now) {
    this.intervalMs = intervalMs;
    this.now = now;
  }

  tryAcquire(): boolean {
    const current = this.now();
    if (this.lastSentAt !== null && current - this.lastSentAt < this.intervalMs) {
      return false;
    }

    this.lastSentAt = current;
    return true;
  }

  msUntilNext(): number {
    if (this.lastSentAt === null) {
      return 0;
    }
    return Math.max(0, this.lastSentAt + this.intervalMs - this.now());
  }
}
