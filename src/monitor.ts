import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';
import { AppConfig, CycleOutcome, SlotResult, UserAppointmentSpec } from './types';
import { ConfigurationError, LoginFailedError, describeError } from './errors';
import { AlertDispatcher } from './alerts';
import { DebugArtifacts } from './artifacts';
import { formatDateRange } from './dates';
import { workerLogger } from './logger';
import { NavigationMachine } from './navigation';
import { SessionRegistry } from './session-registry';
import type { SiteDriver } from './site-driver';
import { StateStore, StateUpdate } from './state-store';

export type WorkerPhase = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped' | 'halted';

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export interface CycleReport {
  outcome: CycleOutcome | 'error';
  slots: SlotResult[];
  nextDelayMs: number;
}

export interface MonitorDeps {
  config: AppConfig;
  logger: Logger;
  sessions: SessionRegistry;
  store: StateStore;
  alerts: AlertDispatcher;
  artifacts: DebugArtifacts;
  sleep?: Sleeper;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

/**
 * One monitoring worker for one user: logs in, then checks for open appointments every
 * interval until stopped.
 */
export class AppointmentMonitor {
  private readonly deps: MonitorDeps;
  private readonly user: UserAppointmentSpec;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;
  private readonly controller = new AbortController();
  private phaseValue: WorkerPhase = 'idle';
  private stopRequested = false;
  private machine: NavigationMachine | null = null;
  private loop: Promise<void> | null = null;

  constructor(deps: MonitorDeps) {
    if (!deps.config.user) {
      throw new ConfigurationError('No user configuration present.');
    }

    this.deps = deps;
    this.user = deps.config.user;
    this.logger = workerLogger(deps.logger, this.user);
    this.sleep = deps.sleep ?? abortableSleep;
    deps.artifacts.prepare();
  }

  get key(): string {
    return this.user.email;
  }

  get phase(): WorkerPhase {
    return this.phaseValue;
  }

  private get configuredRange(): string {
    return formatDateRange(this.user.startDate, this.user.endDate);
  }

  /** Starts the loop in the background and returns immediately. */
  start(): void {
    if (this.phaseValue !== 'idle') {
      throw new Error(`Monitor cannot start from phase ${this.phaseValue}.`);
    }

    this.phaseValue = 'starting';
    this.loop = this.run();
  }

  stop(): void {
    this.stopRequested = true;
    if (this.phaseValue === 'starting' || this.phaseValue === 'running') {
      this.phaseValue = 'stopping';
    }
    this.controller.abort();
  }

  /** Resolves when the loop has exited. */
  async done(): Promise<void> {
    await this.loop;
  }

  /**
   * Stops the loop, waits for it up to the shutdown window, then records `stopped` and
   * releases the session.
   */
  async shutdown(reason: string): Promise<void> {
    this.logger.info({ reason }, 'Shutting down monitor');
    this.stop();

    if (this.loop) {
      const timer = new AbortController();
      const finished = await Promise.race([
        this.loop.then(() => true),
        delay(this.deps.config.monitoring.shutdownTimeoutMs, false, { signal: timer.signal }).catch(
          () => false
        ),
      ]);
      timer.abort();

      if (!finished) {
        this.logger.warn('Monitoring loop did not finish within the shutdown window');
      }
    }

    await this.writeState({ status: 'stopped', notes: `Stopped: ${reason}` }, true);
    await this.deps.sessions.close(this.key);
    this.machine = null;
    if (this.phaseValue !== 'halted') {
      this.phaseValue = 'stopped';
    }
  }

  /** Opens a session and logs in, retrying up to the configured number of attempts. */
  async initialize(signal: AbortSignal = this.controller.signal): Promise<boolean> {
    const { maxRetries, errorRetryIntervalSeconds } = this.deps.config.monitoring;
    const attempts = Math.max(1, maxRetries);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      if (signal.aborted) {
        return false;
      }

      try {
        const machine = await this.acquireMachine();
        await machine.login();
        return true;
      } catch (error) {
        lastError = error;
        this.logger.warn({ err: error, attempt, attempts }, 'Initialization attempt failed');
        if (attempt < attempts) {
          await this.sleep(errorRetryIntervalSeconds * 1000, signal);
        }
      }
    }

    await this.writeState({
      status: lastError instanceof LoginFailedError ? 'login_failed' : 'error',
      notes: `Initialization failed: ${describeError(lastError)}`,
    });
    if (!this.stopRequested) {
      await this.deps.alerts.fatal(this.user, 'initialization');
    }
    return false;
  }

  async runCycle(): Promise<CycleReport> {
    const { checkIntervalSeconds } = this.deps.config.monitoring;
    const normalDelayMs = checkIntervalSeconds * 1000;
    let machine: NavigationMachine | null = null;

    await this.writeState({
      status: 'checking',
      dateRange: this.configuredRange,
      location: this.user.location,
      notes: 'Checking for appointments',
    });

    try {
      machine = await this.acquireMachine();
      machine.beginCycle();
      const outcome = await machine.checkSlots();

      if (outcome.slots.length > 0) {
        for (const slot of outcome.slots) {
          await this.deps.alerts.availability(this.user, slot);
        }

        const booked = outcome.slots.find((slot) => slot.autoBooked);
        if (booked) {
          this.logger.info({ slot: booked }, 'Appointment booked');
          await this.writeState({
            status: 'available',
            slotAvailable: true,
            dateRange: booked.date,
            location: booked.city,
            notes: `Booked ${booked.date} ${booked.time} in ${booked.city}`,
          });
          return { outcome: 'booked', slots: outcome.slots, nextDelayMs: normalDelayMs };
        }

        const [first] = outcome.slots;
        this.logger.info({ count: outcome.slots.length, first }, 'Appointments available');
        await this.writeState({
          status: 'available',
          slotAvailable: true,
          dateRange: first.date,
          location: first.city,
          notes: `${outcome.slots.length} slot(s) found`,
        });
        return { outcome: 'available', slots: outcome.slots, nextDelayMs: normalDelayMs };
      }

      if (outcome.busy) {
        await this.capture(machine.driver, 'system_busy');
        await this.recordBusy();
        return { outcome: 'busy', slots: [], nextDelayMs: normalDelayMs };
      }

      this.logger.info('No appointments available');
      await this.writeState({
        status: 'unavailable',
        slotAvailable: false,
        dateRange: this.configuredRange,
        location: this.user.location,
        notes: 'No appointments available',
      });
      return { outcome: 'unavailable', slots: [], nextDelayMs: normalDelayMs };
    } catch (error) {
      return this.handleCycleError(error, machine);
    }
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;

    try {
      await this.writeState({
        status: 'starting',
        dateRange: this.configuredRange,
        location: this.user.location,
        notes: 'Monitoring started',
      });
      await this.deps.alerts.startup(this.user);

      if (!(await this.initialize(signal))) {
        if (!this.stopRequested) {
          this.phaseValue = 'halted';
          this.logger.error('Initialization failed, worker halted');
        }
        return;
      }

      if (!this.stopRequested) {
        this.phaseValue = 'running';
      }

      while (!signal.aborted) {
        const report = await this.runCycle();
        if (signal.aborted) {
          break;
        }
        if (report.outcome === 'booked') {
          this.logger.info('Appointment booked, monitoring finished');
          break;
        }
        this.logger.debug({ outcome: report.outcome, nextDelayMs: report.nextDelayMs }, 'Sleeping');
        await this.sleep(report.nextDelayMs, signal);
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Monitoring loop failed');
    } finally {
      if (this.phaseValue !== 'halted') {
        this.phaseValue = 'stopped';
      }
      this.logger.info('Monitoring loop exited');
    }
  }

  private async handleCycleError(error: unknown, machine: NavigationMachine | null): Promise<CycleReport> {
    const { checkIntervalSeconds, errorRetryIntervalSeconds } = this.deps.config.monitoring;

    if (machine && (await machine.isBusy())) {
      this.logger.info({ reason: describeError(error) }, 'Check interrupted by busy page');
      await this.recordBusy();
      return { outcome: 'busy', slots: [], nextDelayMs: checkIntervalSeconds * 1000 };
    }

    this.logger.error({ err: error }, 'Check cycle failed');
    await this.capture(machine?.driver ?? null, 'monitor_error');
    if (!this.stopRequested) {
      await this.deps.alerts.error(this.user, 'appointment check');
    }

    const loginFailure = error instanceof LoginFailedError;
    await this.writeState({
      status: loginFailure ? 'login_failed' : 'error',
      slotAvailable: false,
      notes: `${loginFailure ? 'Login failed' : 'Check failed'}: ${describeError(error)} Retrying in ${errorRetryIntervalSeconds}s.`,
    });
    return { outcome: 'error', slots: [], nextDelayMs: errorRetryIntervalSeconds * 1000 };
  }

  private async recordBusy(): Promise<void> {
    this.logger.info('System busy, will retry at the normal interval');
    await this.writeState({
      status: 'busy',
      slotAvailable: false,
      dateRange: this.configuredRange,
      location: this.user.location,
      notes: 'System busy, will retry',
    });
  }

  private async acquireMachine(): Promise<NavigationMachine> {
    const driver = await this.deps.sessions.acquire(this.key);
    if (!this.machine || this.machine.driver !== driver) {
      this.machine = new NavigationMachine(driver, {
        config: this.deps.config,
        user: this.user,
        logger: this.logger,
        onLoginResult: (success) => this.recordLogin(success),
        capture: (prefix) => this.capture(driver, prefix),
      });
    }
    return this.machine;
  }

  private async recordLogin(success: boolean): Promise<void> {
    if (!this.canWrite(false)) {
      return;
    }
    await this.deps.store.updateLoginState(this.key, success);
  }

  private async capture(driver: SiteDriver | null, prefix: string): Promise<void> {
    const artifact = await this.deps.artifacts.capture(driver, prefix);
    if (artifact) {
      await this.deps.alerts.debugCapture(this.user, artifact);
    }
  }

  private canWrite(force: boolean): boolean {
    if (this.stopRequested && !force) {
      this.logger.debug('Monitor stopping, state write skipped');
      return false;
    }
    return true;
  }

  private async writeState(update: StateUpdate, force = false): Promise<void> {
    if (!this.canWrite(force)) {
      return;
    }
    await this.deps.store.update(this.key, update);
  }
}
