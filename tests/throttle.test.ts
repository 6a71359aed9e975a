import { describe, it, expect } from 'vitest';
import { NotificationThrottle } from '../src/throttle';

const FIVE_MINUTES = 5 * 60 * 1000;

describe('NotificationThrottle', () => {
  it('lets one event through for events 90s apart', () => {
    let now = 1_000_000;
    const throttle = new NotificationThrottle(FIVE_MINUTES, () => now);

    const sent = [throttle.tryAcquire()];
    now += 90_000;
    sent.push(throttle.tryAcquire());

    expect(sent.filter(Boolean)).toHaveLength(1);
  });

  it('lets both events through for events 310s apart', () => {
    let now = 1_000_000;
    const throttle = new NotificationThrottle(FIVE_MINUTES, () => now);

    const sent = [throttle.tryAcquire()];
    now += 310_000;
    sent.push(throttle.tryAcquire());

    expect(sent).toEqual([true, true]);
  });

  it('measures the window from the last event let through', () => {
    let now = 0;
    const throttle = new NotificationThrottle(FIVE_MINUTES, () => now);

    expect(throttle.tryAcquire()).toBe(true);
    now = 200_000;
    expect(throttle.tryAcquire()).toBe(false);
    now = 299_999;
    expect(throttle.tryAcquire()).toBe(false);
    expect(throttle.msUntilNext()).toBe(1);
    now = 300_000;
    expect(throttle.tryAcquire()).toBe(true);
    now = 500_000;
    expect(throttle.tryAcquire()).toBe(false);
  });
});
