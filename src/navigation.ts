import type { Logger } from 'pino';
import { AppConfig, FlowContext, ScanOutcome, UserAppointmentSpec } from './types';
import { LoginFailedError, NavigationError, describeError, isSessionExpired } from './errors';
import { isSystemBusy } from './busy';
import { runFlow } from './flow-runner';
import { loginFlow } from './flows/login.flow';
import { PageKind, RescheduleProgress, createRescheduleFlow } from './flows/reschedule.flow';
import { scanSlots } from './flows/slot-scan.flow';
import type { SiteDriver } from './site-driver';

export type NavigationState =
  | 'logged_out'
  | 'logging_in'
  | 'on_group_page'
  | 'on_reschedule_page'
  | 'on_unknown_page'
  | 'error';

export interface NavigationDeps {
  config: AppConfig;
  user: UserAppointmentSpec;
  logger: Logger;
  /** Called after every login attempt with its result. */
  onLoginResult: (success: boolean) => Promise<void>;
  capture: (prefix: string) => Promise<void>;
}

const PAGE_STATES: Record<PageKind, NavigationState> = {
  reschedule: 'on_reschedule_page',
  group: 'on_group_page',
  unknown: 'on_unknown_page',
  login: 'logged_out',
};

/**
 * Drives one session from sign-in to the reschedule form. A session expiry inside a
 * cycle is answered with one fresh login; a second one in the same cycle fails it.
 */
export class NavigationMachine {
  readonly driver: SiteDriver;
  private readonly deps: NavigationDeps;
  private current: NavigationState = 'logged_out';
  private authenticated = false;
  private reloginsThisCycle = 0;

  constructor(driver: SiteDriver, deps: NavigationDeps) {
    this.driver = driver;
    this.deps = deps;
  }

  get state(): NavigationState {
    return this.current;
  }

  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  beginCycle(): void {
    this.reloginsThisCycle = 0;
  }

  private context(): FlowContext {
    return {
      config: this.deps.config,
      logger: this.deps.logger,
      user: this.deps.user,
      driver: this.driver,
      debug: this.deps.capture,
    };
  }

  async login(): Promise<void> {
    const { logger } = this.deps;
    this.current = 'logging_in';
    this.authenticated = false;

    try {
      await runFlow(loginFlow, this.context());
    } catch (error) {
      this.current = 'error';
      logger.error({ err: error }, 'Login failed');
      await this.deps.capture('login_error');
      await this.deps.onLoginResult(false);
      if (error instanceof LoginFailedError) {
        throw error;
      }
      throw new LoginFailedError(`Login failed: ${describeError(error)}`, { cause: error });
    }

    this.current = 'on_group_page';
    this.authenticated = true;
    logger.info('Login successful');
    await this.deps.onLoginResult(true);
  }

  async ensureLoggedIn(): Promise<void> {
    if (!this.authenticated) {
      await this.login();
    }
  }

  async navigateToReschedule(): Promise<void> {
    const progress: RescheduleProgress = { page: 'unknown' };

    try {
      await runFlow(createRescheduleFlow(progress), this.context());
      this.current = PAGE_STATES[progress.page];
    } catch (error) {
      this.current = isSessionExpired(error) ? 'logged_out' : 'error';
      throw error;
    }
  }

  /** Logs in if needed, reaches the reschedule form and scans every location. */
  async checkSlots(): Promise<ScanOutcome> {
    return this.withRecovery(async () => {
      await this.ensureLoggedIn();
      await this.navigateToReschedule();
      return scanSlots(this.context());
    });
  }

  async isBusy(): Promise<boolean> {
    return isSystemBusy(this.driver, this.deps.config.site.busyMarkers, this.deps.logger);
  }

  private async withRecovery<T>(operation: () => Promise<T>): Promise<T> {
    for (;;) {
      try {
        return await operation();
      } catch (error) {
        if (!isSessionExpired(error)) {
          throw error;
        }

        this.authenticated = false;
        this.current = 'logged_out';

        if (this.reloginsThisCycle > 0) {
          throw new NavigationError('Session expired again after re-login.', { cause: error });
        }

        this.reloginsThisCycle += 1;
        this.deps.logger.warn({ reason: error.message }, 'Session expired, logging in again');
        await this.login();
      }
    }
  }
}
