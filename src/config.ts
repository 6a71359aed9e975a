import path from 'path';
import { config as dotenvConfig } from 'dotenv';
import { AppConfig, LogLevel, UserAppointmentSpec } from './types';

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

const DEFAULT_BASE_URL = 'https://ais.usvisa-info.com/en-ca/niv';
const DEFAULT_HEADLESS = true;
const DEFAULT_SLOW_MO = 0;
const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_GLOBAL_TIMEOUT = 30000;
const DEFAULT_CHECK_INTERVAL_SECONDS = 300;
const DEFAULT_ERROR_RETRY_INTERVAL_SECONDS = 60;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10000;
const DEFAULT_DEBUG_NOTIFICATION_INTERVAL_SECONDS = 300;
const DEFAULT_LOGS_DIR = './logs';
const DEFAULT_STATE_DIR = './state';

export const DEFAULT_BUSY_MARKERS = [
  'system is busy',
  'please try again later',
  'system busy',
  'try again later',
];
export const DEFAULT_LOGIN_URL_MARKERS = ['/users/sign_in'];
export const DEFAULT_POST_LOGIN_URL_MARKER = '/groups/';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }

  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function loadUser(env: NodeJS.ProcessEnv): UserAppointmentSpec | null {
  const email = env.ACCOUNT_EMAIL?.trim() || '';
  if (!email) {
    return null;
  }

  return {
    email,
    password: env.ACCOUNT_PASSWORD?.trim() || '',
    location: env.APPOINTMENT_LOCATION?.trim() || '',
    startDate: env.APPOINTMENT_START_DATE?.trim() || '',
    endDate: env.APPOINTMENT_END_DATE?.trim() || '',
    preferredCities: parseList(env.APPOINTMENT_PREFERRED_CITIES, []),
    ivrNumber: env.APPOINTMENT_IVR_NUMBER?.trim() || undefined,
    autoBook: parseBoolean(env.APPOINTMENT_AUTO_BOOK, false),
  };
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  if (!options.env) {
    dotenvConfig({ path: options.path });
  }

  const env = options.env ?? process.env;

  return {
    site: {
      baseUrl: (env.SITE_BASE_URL?.trim() || DEFAULT_BASE_URL).replace(/\/+$/, ''),
      busyMarkers: parseList(env.BUSY_MARKERS, DEFAULT_BUSY_MARKERS),
      loginUrlMarkers: parseList(env.LOGIN_URL_MARKERS, DEFAULT_LOGIN_URL_MARKERS),
      postLoginUrlMarker: env.POST_LOGIN_URL_MARKER?.trim() || DEFAULT_POST_LOGIN_URL_MARKER,
    },
    user: loadUser(env),
    monitoring: {
      checkIntervalSeconds: parseNumber(env.CHECK_INTERVAL_SECONDS, DEFAULT_CHECK_INTERVAL_SECONDS),
      errorRetryIntervalSeconds: parseNumber(
        env.ERROR_RETRY_INTERVAL_SECONDS,
        DEFAULT_ERROR_RETRY_INTERVAL_SECONDS
      ),
      maxRetries: parseNumber(env.MAX_RETRIES, DEFAULT_MAX_RETRIES),
      shutdownTimeoutMs: parseNumber(env.SHUTDOWN_TIMEOUT_MS, DEFAULT_SHUTDOWN_TIMEOUT_MS),
    },
    debug: {
      enabled: parseBoolean(env.DEBUG_ENABLED, false),
      saveScreenshots: parseBoolean(env.DEBUG_SAVE_SCREENSHOTS, true),
      saveHtml: parseBoolean(env.DEBUG_SAVE_HTML, true),
      sendNotifications: parseBoolean(env.DEBUG_SEND_NOTIFICATIONS, false),
      notificationIntervalSeconds: parseNumber(
        env.DEBUG_NOTIFICATION_INTERVAL_SECONDS,
        DEFAULT_DEBUG_NOTIFICATION_INTERVAL_SECONDS
      ),
    },
    notification: {
      webhookUrl: env.NOTIFY_WEBHOOK_URL?.trim() || '',
      webhookSecret: env.NOTIFY_WEBHOOK_SECRET?.trim() || '',
    },
    headless: parseBoolean(env.HEADLESS, DEFAULT_HEADLESS),
    slowMo: parseNumber(env.SLOW_MO, DEFAULT_SLOW_MO),
    globalTimeout: parseNumber(env.GLOBAL_TIMEOUT, DEFAULT_GLOBAL_TIMEOUT),
    browserExecutablePath: env.BROWSER_EXECUTABLE_PATH?.trim() || '',
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_LOG_LEVEL),
    logsDir: path.resolve(env.LOGS_DIR?.trim() || DEFAULT_LOGS_DIR),
    stateDir: path.resolve(env.STATE_DIR?.trim() || DEFAULT_STATE_DIR),
  };
}

export function validateConfig(config: AppConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];
  const { user, monitoring } = config;

  if (!user) {
    errors.push({
      field: 'ACCOUNT_EMAIL',
      message: 'Missing account email (ACCOUNT_EMAIL).',
    });
  } else {
    if (!user.password) {
      errors.push({
        field: 'ACCOUNT_PASSWORD',
        message: 'Missing account password (ACCOUNT_PASSWORD).',
      });
    }

    if (!user.location) {
      errors.push({
        field: 'APPOINTMENT_LOCATION',
        message: 'Missing appointment location (APPOINTMENT_LOCATION).',
      });
    }

    if (!ISO_DATE.test(user.startDate)) {
      errors.push({
        field: 'APPOINTMENT_START_DATE',
        message: 'APPOINTMENT_START_DATE must be a YYYY-MM-DD date.',
      });
    }

    if (!ISO_DATE.test(user.endDate)) {
      errors.push({
        field: 'APPOINTMENT_END_DATE',
        message: 'APPOINTMENT_END_DATE must be a YYYY-MM-DD date.',
      });
    }

    if (ISO_DATE.test(user.startDate) && ISO_DATE.test(user.endDate) && user.startDate > user.endDate) {
      errors.push({
        field: 'APPOINTMENT_END_DATE',
        message: 'APPOINTMENT_END_DATE must not be before APPOINTMENT_START_DATE.',
      });
    }
  }

  if (!config.site.baseUrl) {
    errors.push({
      field: 'SITE_BASE_URL',
      message: 'Missing base URL (SITE_BASE_URL).',
    });
  }

  if (!Number.isFinite(monitoring.checkIntervalSeconds) || monitoring.checkIntervalSeconds <= 0) {
    errors.push({
      field: 'CHECK_INTERVAL_SECONDS',
      message: 'CHECK_INTERVAL_SECONDS must be a positive number.',
    });
  }

  if (
    !Number.isFinite(monitoring.errorRetryIntervalSeconds) ||
    monitoring.errorRetryIntervalSeconds <= 0
  ) {
    errors.push({
      field: 'ERROR_RETRY_INTERVAL_SECONDS',
      message: 'ERROR_RETRY_INTERVAL_SECONDS must be a positive number.',
    });
  }

  if (!Number.isInteger(monitoring.maxRetries) || monitoring.maxRetries < 1) {
    errors.push({
      field: 'MAX_RETRIES',
      message: 'MAX_RETRIES must be a positive integer.',
    });
  }

  if (!Number.isFinite(config.slowMo) || config.slowMo < 0) {
    errors.push({
      field: 'SLOW_MO',
      message: 'SLOW_MO must be a non-negative number.',
    });
  }

  if (!Number.isFinite(config.globalTimeout) || config.globalTimeout <= 0) {
    errors.push({
      field: 'GLOBAL_TIMEOUT',
      message: 'GLOBAL_TIMEOUT must be a positive number.',
    });
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push({
      field: 'LOG_LEVEL',
      message: `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}.`,
    });
  }

  return errors;
}

export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    user: config.user
      ? {
          ...config.user,
          password: config.user.password ? '***' : '',
        }
      : null,
    notification: {
      ...config.notification,
      webhookSecret: config.notification.webhookSecret ? '***' : '',
    },
  };
}
