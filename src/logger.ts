import pino, { DestinationStream, Logger, LoggerOptions as PinoOptions } from 'pino';
import { AppConfig, LogLevel, UserAppointmentSpec } from './types';

interface LoggerOptions {
  level?: LogLevel;
  /** Plain JSON lines to this stream instead of stdout. */
  destination?: DestinationStream;
}

// Secrets as they appear in config dumps and error context.
const REDACT_PATHS = [
  'password',
  'webhookSecret',
  '*.password',
  '*.webhookSecret',
  'config.user.password',
  'config.notification.webhookSecret',
];

export function createLogger(config: AppConfig, options: LoggerOptions = {}): Logger {
  const base: PinoOptions = {
    level: options.level ?? config.logLevel,
    redact: { paths: REDACT_PATHS, censor: '***' },
  };

  if (options.destination) {
    return pino({ ...base, base: { app: 'slotwatch' } }, options.destination);
  }

  if (process.stdout.isTTY) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,app',
        },
      },
    });
  }

  return pino({ ...base, base: { app: 'slotwatch' } });
}

/** Every line from one worker carries its account email. */
export function workerLogger(logger: Logger, user: UserAppointmentSpec): Logger {
  return logger.child({ user: user.email, location: user.location });
}
