import { describe, it, expect, vi, beforeEach } from 'vitest';

const fetchMock = vi.hoisted(() => vi.fn());

vi.mock('undici', () => ({ fetch: fetchMock }));

import {
  LogNotifier,
  NotificationService,
  WebhookNotifier,
  createNotifier,
  createSignature,
} from '../src/notifications';
import { RecordingNotifier, silentLogger, testConfig } from './helpers/config';

describe('WebhookNotifier', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('posts the message as JSON with a signature', async () => {
    fetchMock.mockResolvedValue({ ok: true, status: 200, statusText: 'OK' });
    const notifier = new WebhookNotifier(
      'https://hooks.test/notify',
      'test-secret',
      () => new Date('2024-04-01T12:00:00.000Z')
    );

    await notifier.send('Appointment available', 'Toronto on 2024-04-15');

    const body = JSON.stringify({
      subject: 'Appointment available',
      body: 'Toronto on 2024-04-15',
      sentAt: '2024-04-01T12:00:00.000Z',
    });
    expect(fetchMock).toHaveBeenCalledWith('https://hooks.test/notify', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Signature': createSignature(body, 'test-secret'),
      },
      body,
    });
  });

  it('omits the signature without a secret', async () => {
    fetchMock.mockResolvedValue({ ok: true, status: 200, statusText: 'OK' });

    await new WebhookNotifier('https://hooks.test/notify').send('subject', 'body');

    const [, init] = fetchMock.mock.calls[0];
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('rejects on a failed response', async () => {
    fetchMock.mockResolvedValue({ ok: false, status: 502, statusText: 'Bad Gateway' });

    await expect(new WebhookNotifier('https://hooks.test/notify').send('s', 'b')).rejects.toThrow(
      'Webhook responded 502 Bad Gateway'
    );
  });
});

describe('NotificationService', () => {
  it('reports delivery', async () => {
    const transport = new RecordingNotifier();
    const service = new NotificationService(transport, silentLogger);

    await expect(service.notify('subject', 'body')).resolves.toBe(true);
    expect(transport.sent).toEqual([{ subject: 'subject', body: 'body' }]);
  });

  it('swallows transport failures', async () => {
    const transport = new RecordingNotifier();
    transport.failWith = new Error('connection refused');
    const service = new NotificationService(transport, silentLogger);

    await expect(service.notify('subject', 'body')).resolves.toBe(false);
  });
});

describe('createNotifier', () => {
  it('uses the webhook when one is configured', () => {
    const config = testConfig({
      notification: { webhookUrl: 'https://hooks.test/notify', webhookSecret: '' },
    });
    expect(createNotifier(config, silentLogger)).toBeInstanceOf(WebhookNotifier);
  });

  it('logs otherwise', () => {
    expect(createNotifier(testConfig(), silentLogger)).toBeInstanceOf(LogNotifier);
  });
});
