import crypto from 'crypto';
import type { Logger } from 'pino';
import { fetch } from 'undici';
import { AppConfig } from './types';

export interface Notifier {
  send(subject: string, body: string): Promise<void>;
}

export function createSignature(payload: string, secret: string): string {
  const hmac = crypto.createHmac('sha256', secret);
  hmac.update(payload);
  return hmac.digest('hex');
}

/** Writes notifications to the log. Used when no webhook is configured. */
export class LogNotifier implements Notifier {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async send(subject: string, body: string): Promise<void> {
    this.logger.info({ subject, body }, 'Notification');
  }
}

export class WebhookNotifier implements Notifier {
  private readonly url: string;
  private readonly secret: string;
  private readonly now: () => Date;

  constructor(url: string, secret = '', now: () => Date = () => new Date()) {
    this.url = url;
    this.secret = secret;
    this.now = now;
  }

  async send(subject: string, body: string): Promise<void> {
    const payload = JSON.stringify({ subject, body, sentAt: this.now().toISOString() });
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.secret) {
      headers['X-Signature'] = createSignature(payload, this.secret);
    }

    const response = await fetch(this.url, { method: 'POST', headers, body: payload });
    if (!response.ok) {
      throw new Error(`Webhook responded ${response.status} ${response.statusText}`);
    }
  }
}

/** Delivers through a transport; delivery failures are logged and reported as `false`. */
export class NotificationService {
  private readonly transport: Notifier;
  private readonly logger: Logger;

  constructor(transport: Notifier, logger: Logger) {
    this.transport = transport;
    this.logger = logger;
  }

  async notify(subject: string, body: string): Promise<boolean> {
    try {
      await this.transport.send(subject, body);
      this.logger.info({ subject }, 'Notification sent');
      return true;
    } catch (error) {
      this.logger.error({ err: error, subject }, 'Failed to send notification');
      return false;
    }
  }
}

export function createNotifier(config: AppConfig, logger: Logger): Notifier {
  if (config.notification.webhookUrl) {
    return new WebhookNotifier(config.notification.webhookUrl, config.notification.webhookSecret);
  }
  return new LogNotifier(logger);
}
