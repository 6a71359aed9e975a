import { describe, it, expect, vi } from 'vitest';
import { AppointmentMonitor, Sleeper } from '../src/monitor';
import { AlertDispatcher } from '../src/alerts';
import { DebugArtifacts } from '../src/artifacts';
import { ConfigurationError } from '../src/errors';
import { NotificationService } from '../src/notifications';
import { SessionRegistry } from '../src/session-registry';
import { StateStore } from '../src/state-store';
import { NotificationThrottle } from '../src/throttle';
import { AppConfig } from '../src/types';
import { FakePortal, PortalOptions } from './helpers/fake-portal';
import { RecordingNotifier, silentLogger, testConfig } from './helpers/config';

const EMAIL = 'user@example.com';

function harness(options: Partial<PortalOptions> = {}, config: AppConfig = testConfig()) {
  let now = 0;
  const portals: FakePortal[] = [];
  const sessions = new SessionRegistry(async (key) => {
    const portal = new FakePortal(options, key);
    portals.push(portal);
    return portal;
  }, silentLogger);
  const store = new StateStore(config.stateDir, silentLogger);
  const updates = vi.spyOn(store, 'update');
  const transport = new RecordingNotifier();
  const alerts = new AlertDispatcher(
    new NotificationService(transport, silentLogger),
    new NotificationThrottle(config.debug.notificationIntervalSeconds * 1000, () => now),
    config.debug,
    silentLogger
  );
  const artifacts = new DebugArtifacts(config.logsDir, config.debug, silentLogger);

  return {
    portals,
    sessions,
    store,
    transport,
    statuses: () => updates.mock.calls.map(([, update]) => update.status),
    advance: (ms: number) => {
      now += ms;
    },
    monitor: (sleep?: Sleeper) =>
      new AppointmentMonitor({ config, logger: silentLogger, sessions, store, alerts, artifacts, sleep }),
  };
}

describe('AppointmentMonitor', () => {
  it('refuses to start without a user', () => {
    const h = harness({}, testConfig({ user: null }));

    expect(() => h.monitor()).toThrow(ConfigurationError);
  });

  it('logs in, checks once and stops on request', async () => {
    const h = harness();
    const sleeps: number[] = [];
    const monitor = h.monitor(async (ms) => {
      sleeps.push(ms);
      monitor.stop();
    });

    monitor.start();
    await monitor.done();

    expect(h.statuses()).toEqual(['starting', 'logged_in', 'checking', 'unavailable']);
    expect(sleeps).toEqual([300_000]);
    expect(h.transport.subjects()).toEqual(['Appointment monitoring started']);
    expect(monitor.phase).toBe('stopped');
    expect(h.store.get(EMAIL)).toMatchObject({
      status: 'unavailable',
      dateRange: '2024-03-20 ~ 2024-12-31',
      location: 'Toronto',
      slotAvailable: false,
      notes: 'No appointments available',
    });
  });

  it('cannot be started twice', async () => {
    const h = harness();
    const monitor = h.monitor(async () => {
      monitor.stop();
    });

    monitor.start();

    expect(() => monitor.start()).toThrow('Monitor cannot start from phase starting.');
    await monitor.done();
  });

  it('halts after the initial login keeps failing', async () => {
    const monitoring = { ...testConfig().monitoring, maxRetries: 2 };
    const h = harness({ loginFormAppears: false }, testConfig({ monitoring }));
    const sleeps: number[] = [];
    const monitor = h.monitor(async (ms) => {
      sleeps.push(ms);
    });

    monitor.start();
    await monitor.done();

    expect(monitor.phase).toBe('halted');
    expect(sleeps).toEqual([60_000]);
    expect(h.statuses()).toEqual(['starting', 'login_failed', 'login_failed', 'login_failed']);
    expect(h.store.get(EMAIL)).toMatchObject({
      status: 'login_failed',
      notes: 'Initialization failed: Login form did not appear.',
    });
    expect(h.transport.subjects()).toEqual([
      'Appointment monitoring started',
      'Appointment monitoring stopped',
    ]);
  });

  it('alerts on every slot found, every cycle', async () => {
    const h = harness({
      openDays: [
        { year: 2024, month: 3, day: 15 },
        { year: 2024, month: 1, day: 10 },
        { year: 2024, month: 5, day: 1 },
      ],
      times: { '2024-04-15': ['09:00', '10:30'], '2024-06-01': ['08:15'] },
    });
    const monitor = h.monitor();

    const first = await monitor.runCycle();
    await monitor.runCycle();

    expect(first.outcome).toBe('available');
    expect(first.nextDelayMs).toBe(300_000);
    expect(first.slots.map((slot) => `${slot.date} ${slot.time}`)).toEqual([
      '2024-04-15 09:00',
      '2024-04-15 10:30',
      '2024-06-01 08:15',
    ]);
    expect(h.transport.subjects()).toEqual([
      'Appointment available: Toronto on 2024-04-15',
      'Appointment available: Toronto on 2024-04-15',
      'Appointment available: Toronto on 2024-06-01',
      'Appointment available: Toronto on 2024-04-15',
      'Appointment available: Toronto on 2024-04-15',
      'Appointment available: Toronto on 2024-06-01',
    ]);
    expect(h.statuses()).toEqual(['checking', 'logged_in', 'available', 'checking', 'available']);
    expect(h.portals).toHaveLength(1);

    const state = h.store.get(EMAIL);
    expect(state).toMatchObject({
      status: 'available',
      slotAvailable: true,
      dateRange: '2024-04-15',
      location: 'Toronto',
      notes: '3 slot(s) found',
    });
    expect(state.lastSlotFoundAt).toBe(state.lastCheckedAt);
  });

  it('stops monitoring once a slot is booked', async () => {
    const h = harness(
      { openDays: [{ year: 2024, month: 3, day: 15 }], times: { '2024-04-15': ['09:00', '10:30'] } },
      testConfig({}, { autoBook: true })
    );
    const sleeps: number[] = [];
    const monitor = h.monitor(async (ms) => {
      sleeps.push(ms);
    });

    monitor.start();
    await monitor.done();

    expect(monitor.phase).toBe('stopped');
    expect(sleeps).toEqual([]);
    expect(h.statuses()).toEqual(['starting', 'logged_in', 'checking', 'available']);
    expect(h.transport.subjects()).toEqual([
      'Appointment monitoring started',
      'Appointment booked: Toronto on 2024-04-15 at 09:00',
      'Appointment available: Toronto on 2024-04-15',
    ]);
    expect(h.transport.sent[1].body).toContain('Booked automatically: yes');
    expect(h.store.get(EMAIL)).toMatchObject({
      status: 'available',
      slotAvailable: true,
      dateRange: '2024-04-15',
      location: 'Toronto',
      notes: 'Booked 2024-04-15 09:00 in Toronto',
    });
  });

  it('sends no error alert for a cycle that fails after stop', async () => {
    const h = harness({ cards: [] });
    const monitor = h.monitor();

    const cycle = monitor.runCycle();
    monitor.stop();
    const report = await cycle;

    expect(report.outcome).toBe('error');
    expect(h.transport.sent).toEqual([]);
    expect(h.statuses()).toEqual(['checking']);
  });

  it('sends no fatal alert for an initialization that fails after stop', async () => {
    const monitoring = { ...testConfig().monitoring, maxRetries: 1 };
    const h = harness({ loginFormAppears: false }, testConfig({ monitoring }));
    const monitor = h.monitor();

    const init = monitor.initialize();
    monitor.stop();

    expect(await init).toBe(false);
    expect(h.transport.sent).toEqual([]);
    expect(h.statuses()).toEqual([]);
  });

  it('records a busy portal without raising an error alert', async () => {
    const h = harness({ openDays: [{ year: 2024, month: 3, day: 15 }], busyAfter: 'datepicker' });
    const monitor = h.monitor();

    const report = await monitor.runCycle();

    expect(report).toEqual({ outcome: 'busy', slots: [], nextDelayMs: 300_000 });
    expect(h.store.get(EMAIL)).toMatchObject({ status: 'busy', notes: 'System busy, will retry' });
    expect(h.transport.sent).toEqual([]);
  });

  it('retries sooner after a failed check and throttles the error alert', async () => {
    const h = harness({ cards: [] });
    const monitor = h.monitor();

    const report = await monitor.runCycle();

    expect(report).toEqual({ outcome: 'error', slots: [], nextDelayMs: 60_000 });
    expect(h.store.get(EMAIL)).toMatchObject({
      status: 'error',
      notes: 'Check failed: Could not find the Continue button. Retrying in 60s.',
    });
    expect(h.transport.subjects()).toEqual(['Appointment monitoring error']);

    h.advance(90_000);
    await monitor.runCycle();
    expect(h.transport.subjects()).toHaveLength(1);

    h.advance(220_000);
    await monitor.runCycle();
    expect(h.transport.subjects()).toEqual(['Appointment monitoring error', 'Appointment monitoring error']);
  });

  it('replaces a session that stopped responding', async () => {
    const h = harness();
    const monitor = h.monitor();

    await monitor.runCycle();
    h.portals[0].unresponsive = true;
    await monitor.runCycle();

    expect(h.portals).toHaveLength(2);
    expect(h.portals[0].closed).toBe(true);
    expect(h.portals[1].loginAttempts).toBe(1);
    expect(h.store.get(EMAIL).status).toBe('unavailable');
  });

  it('records stopped and releases the session on shutdown', async () => {
    const h = harness();
    const sleeper = vi.fn(
      (_ms: number, signal: AbortSignal) =>
        new Promise<void>((resolve) => {
          signal.addEventListener('abort', () => resolve(), { once: true });
        })
    );
    const monitor = h.monitor(sleeper);

    monitor.start();
    await vi.waitFor(() => expect(sleeper).toHaveBeenCalled());
    await monitor.shutdown('SIGINT');

    expect(monitor.phase).toBe('stopped');
    expect(h.store.get(EMAIL)).toMatchObject({ status: 'stopped', notes: 'Stopped: SIGINT' });
    expect(h.statuses().at(-1)).toBe('stopped');
    expect(h.portals[0].closed).toBe(true);
    expect(h.sessions.has(EMAIL)).toBe(false);
  });
});
