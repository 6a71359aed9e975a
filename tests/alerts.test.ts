import { describe, it, expect } from 'vitest';
import { AlertDispatcher } from '../src/alerts';
import { NotificationService } from '../src/notifications';
import { NotificationThrottle } from '../src/throttle';
import { DebugArtifact, DebugConfig, SlotResult } from '../src/types';
import { RecordingNotifier, silentLogger, testUser } from './helpers/config';

const user = testUser();
const slot: SlotResult = { city: 'Toronto', date: '2024-04-15', time: '09:00', autoBooked: false };
const artifact: DebugArtifact = {
  timestamp: '20240401_120000',
  prefix: 'monitor_error',
  url: 'https://portal.test/en-ca/niv/groups/4242',
  screenshotPath: '/tmp/logs/monitor_error_20240401_120000.png',
};

function dispatcher(debug: Partial<DebugConfig> = {}) {
  let now = 0;
  const transport = new RecordingNotifier();
  const alerts = new AlertDispatcher(
    new NotificationService(transport, silentLogger),
    new NotificationThrottle(300_000, () => now),
    {
      enabled: false,
      saveScreenshots: true,
      saveHtml: true,
      sendNotifications: false,
      notificationIntervalSeconds: 300,
      ...debug,
    },
    silentLogger
  );
  return {
    alerts,
    transport,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('AlertDispatcher', () => {
  it('never throttles availability', async () => {
    const { alerts, transport } = dispatcher();

    await alerts.availability(user, slot);
    await alerts.availability(user, slot);
    await alerts.availability(user, slot);

    expect(transport.subjects()).toEqual([
      'Appointment available: Toronto on 2024-04-15',
      'Appointment available: Toronto on 2024-04-15',
      'Appointment available: Toronto on 2024-04-15',
    ]);
  });

  it('describes the slot without internal detail', async () => {
    const { alerts, transport } = dispatcher();

    await alerts.availability(user, slot);

    expect(transport.sent[0].body).toBe(
      [
        'User: user@example.com',
        'Location: Toronto',
        'Date range: 2024-03-20 ~ 2024-12-31',
        '',
        'City: Toronto',
        'Date: 2024-04-15',
        'Time: 09:00',
        'Booked automatically: no',
      ].join('\n')
    );
  });

  it('throttles error alerts', async () => {
    const { alerts, transport, advance } = dispatcher();

    expect(await alerts.error(user, 'appointment check')).toBe(true);
    advance(90_000);
    expect(await alerts.error(user, 'appointment check')).toBe(false);
    advance(220_000);
    expect(await alerts.error(user, 'appointment check')).toBe(true);

    expect(transport.subjects()).toEqual(['Appointment monitoring error', 'Appointment monitoring error']);
  });

  it('mutes startup, fatal and error alerts in debug mode', async () => {
    const { alerts, transport } = dispatcher({ enabled: true });

    await alerts.startup(user);
    await alerts.fatal(user, 'initialization');
    await alerts.error(user, 'appointment check');

    expect(transport.sent).toEqual([]);
  });

  it('sends startup and fatal alerts outside debug mode', async () => {
    const { alerts, transport } = dispatcher();

    await alerts.startup(user);
    await alerts.fatal(user, 'initialization');

    expect(transport.subjects()).toEqual(['Appointment monitoring started', 'Appointment monitoring stopped']);
  });

  it('sends debug captures only when debug notifications are on', async () => {
    const quiet = dispatcher({ enabled: true });
    await quiet.alerts.debugCapture(user, artifact);
    expect(quiet.transport.sent).toEqual([]);

    const loud = dispatcher({ enabled: true, sendNotifications: true });
    await loud.alerts.debugCapture(user, artifact);
    await loud.alerts.debugCapture(user, artifact);
    expect(loud.transport.subjects()).toEqual(['Debug capture: monitor_error']);
  });
});
