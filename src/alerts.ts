import type { Logger } from 'pino';
import { DebugArtifact, DebugConfig, SlotResult, UserAppointmentSpec } from './types';
import { NotificationService } from './notifications';
import { NotificationThrottle } from './throttle';
import {
  Message,
  availabilityMessage,
  debugMessage,
  errorMessage,
  fatalMessage,
  startupMessage,
} from './messages';

/**
 * Decides which notifications go out. Availability is never throttled; error and debug
 * captures share one throttle; startup, fatal and error alerts are muted in debug mode.
 */
export class AlertDispatcher {
  private readonly service: NotificationService;
  private readonly throttle: NotificationThrottle;
  private readonly debug: DebugConfig;
  private readonly logger: Logger;

  constructor(
    service: NotificationService,
    throttle: NotificationThrottle,
    debug: DebugConfig,
    logger: Logger
  ) {
    this.service = service;
    this.throttle = throttle;
    this.debug = debug;
    this.logger = logger;
  }

  async availability(user: UserAppointmentSpec, slot: SlotResult): Promise<boolean> {
    return this.deliver(availabilityMessage(user, slot));
  }

  async startup(user: UserAppointmentSpec): Promise<boolean> {
    if (this.debug.enabled) {
      this.logger.debug('Debug mode on, startup notification skipped');
      return false;
    }
    return this.deliver(startupMessage(user));
  }

  async fatal(user: UserAppointmentSpec, context: string): Promise<boolean> {
    if (this.debug.enabled) {
      this.logger.debug({ context }, 'Debug mode on, fatal notification skipped');
      return false;
    }
    return this.deliver(fatalMessage(user, context));
  }

  async error(user: UserAppointmentSpec, context: string): Promise<boolean> {
    if (this.debug.enabled) {
      this.logger.debug({ context }, 'Debug mode on, error notification skipped');
      return false;
    }
    return this.throttled(errorMessage(user, context));
  }

  async debugCapture(user: UserAppointmentSpec, artifact: DebugArtifact): Promise<boolean> {
    if (!this.debug.enabled || !this.debug.sendNotifications) {
      return false;
    }
    return this.throttled(debugMessage(user, artifact));
  }

  private async throttled(message: Message): Promise<boolean> {
    if (!this.throttle.tryAcquire()) {
      this.logger.info(
        { subject: message.subject, retryInMs: this.throttle.msUntilNext() },
        'Notification throttled'
      );
      return false;
    }
    return this.deliver(message);
  }

  private async deliver(message: Message): Promise<boolean> {
    return this.service.notify(message.subject, message.body);
  }
}
