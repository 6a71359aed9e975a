import fs from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import type { Logger } from 'pino';
import { AppConfig, FlowContext, UserAppointmentSpec } from '../../src/types';
import { DEFAULT_BUSY_MARKERS } from '../../src/config';
import type { SiteDriver } from '../../src/site-driver';
import type { Notifier } from '../../src/notifications';
import { PORTAL_BASE_URL } from './fake-portal';

export const silentLogger: Logger = pino({ level: 'silent' });

const createdDirs: string[] = [];

export function tempDir(prefix = 'slotwatch-test-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  createdDirs.push(dir);
  return dir;
}

/** Deletes every directory `tempDir` handed out so far. */
export function removeTempDirs(): void {
  for (const dir of createdDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function testUser(overrides: Partial<UserAppointmentSpec> = {}): UserAppointmentSpec {
  return {
    email: 'user@example.com',
    password: 'test-secret',
    location: 'Toronto',
    startDate: '2024-03-20',
    endDate: '2024-12-31',
    preferredCities: [],
    ivrNumber: '123456789',
    autoBook: false,
    ...overrides,
  };
}

export function testConfig(
  overrides: Partial<AppConfig> = {},
  user: Partial<UserAppointmentSpec> = {}
): AppConfig {
  const root = tempDir();
  return {
    site: {
      baseUrl: PORTAL_BASE_URL,
      busyMarkers: [...DEFAULT_BUSY_MARKERS],
      loginUrlMarkers: ['/users/sign_in'],
      postLoginUrlMarker: '/groups/',
    },
    user: testUser(user),
    monitoring: {
      checkIntervalSeconds: 300,
      errorRetryIntervalSeconds: 60,
      maxRetries: 3,
      shutdownTimeoutMs: 1000,
    },
    debug: {
      enabled: false,
      saveScreenshots: true,
      saveHtml: true,
      sendNotifications: false,
      notificationIntervalSeconds: 300,
    },
    notification: { webhookUrl: '', webhookSecret: '' },
    headless: true,
    slowMo: 0,
    globalTimeout: 30000,
    browserExecutablePath: '',
    logLevel: 'error',
    logsDir: path.join(root, 'logs'),
    stateDir: path.join(root, 'state'),
    ...overrides,
  };
}

export function flowContext(driver: SiteDriver, config: AppConfig = testConfig()): FlowContext {
  return {
    config,
    logger: silentLogger,
    user: config.user ?? testUser(),
    driver,
  };
}

export class RecordingNotifier implements Notifier {
  sent: { subject: string; body: string }[] = [];
  failWith: Error | null = null;

  async send(subject: string, body: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push({ subject, body });
  }

  subjects(): string[] {
    return this.sent.map((message) => message.subject);
  }
}
