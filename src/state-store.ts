import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { WORKER_STATUSES, WorkerState, WorkerStatus } from './types';
import { ConfigurationError } from './errors';

const STATE_FILE_SUFFIX = '_state.json';

const workerStateSchema = z.object({
  email: z.string(),
  status: z.enum(WORKER_STATUSES),
  lastCheckedAt: z.string().nullable(),
  lastSlotFoundAt: z.string().nullable(),
  dateRange: z.string(),
  location: z.string(),
  slotAvailable: z.boolean(),
  notes: z.string(),
});

export interface StateUpdate {
  status: Exclude<WorkerStatus, 'initializing'>;
  dateRange?: string;
  location?: string;
  slotAvailable?: boolean;
  notes?: string;
}

/** `<first 16 alphanumerics of base64(md5(email))>_state.json` */
export function stateFileName(email: string): string {
  const digest = crypto.createHash('md5').update(email, 'utf8').digest('base64');
  return `${digest.replace(/[^a-zA-Z0-9]/g, '').slice(0, 16)}${STATE_FILE_SUFFIX}`;
}

export function initialState(email: string): WorkerState {
  return {
    email,
    status: 'initializing',
    lastCheckedAt: null,
    lastSlotFoundAt: null,
    dateRange: '',
    location: '',
    slotAvailable: false,
    notes: '',
  };
}

/**
 * One JSON record per user under the state directory. Every update rewrites the whole
 * file; writes for one user are applied in order.
 */
export class StateStore {
  private readonly records = new Map<string, WorkerState>();
  private readonly writes = new Map<string, Promise<void>>();
  private readonly dir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(dir: string, logger: Logger, now: () => Date = () => new Date()) {
    this.dir = dir;
    this.logger = logger;
    this.now = now;

    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(`Cannot create state directory ${dir}`, { cause: error });
    }
  }

  filePath(email: string): string {
    return path.join(this.dir, stateFileName(email));
  }

  get(email: string): WorkerState {
    const cached = this.records.get(email);
    if (cached) {
      return { ...cached };
    }

    const state = this.readFile(this.filePath(email)) ?? initialState(email);
    this.records.set(email, state);
    return { ...state };
  }

  async update(email: string, update: StateUpdate): Promise<WorkerState> {
    const current = this.get(email);
    const timestamp = this.now().toISOString();

    const next: WorkerState = {
      email,
      status: update.status,
      lastCheckedAt: timestamp,
      lastSlotFoundAt: update.slotAvailable ? timestamp : current.lastSlotFoundAt,
      dateRange: update.dateRange ?? current.dateRange,
      location: update.location ?? current.location,
      slotAvailable: update.slotAvailable ?? current.slotAvailable,
      notes: update.notes ?? current.notes,
    };

    this.records.set(email, next);
    this.logger.debug({ email, status: next.status }, 'Worker state updated');
    await this.persist(email, next);
    return { ...next };
  }

  async updateLoginState(email: string, success: boolean): Promise<WorkerState> {
    return this.update(email, {
      status: success ? 'logged_in' : 'login_failed',
      notes: success ? 'Logged in' : 'Login failed',
    });
  }

  list(): WorkerState[] {
    return [...this.records.values()].map((state) => ({ ...state }));
  }

  /** Reads every record in the state directory into memory. */
  loadAll(): WorkerState[] {
    const files = fs.readdirSync(this.dir).filter((file) => file.endsWith(STATE_FILE_SUFFIX));
    for (const file of files) {
      const state = this.readFile(path.join(this.dir, file));
      if (state && !this.records.has(state.email)) {
        this.records.set(state.email, state);
      }
    }
    return this.list();
  }

  private readFile(filePath: string): WorkerState | null {
    if (!fs.existsSync(filePath)) {
      return null;
    }

    try {
      const parsed = workerStateSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
      if (!parsed.success) {
        this.logger.warn({ file: filePath, issues: parsed.error.issues.length }, 'Ignoring invalid state file');
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn({ err: error, file: filePath }, 'Ignoring unreadable state file');
      return null;
    }
  }

  private persist(email: string, state: WorkerState): Promise<void> {
    const previous = this.writes.get(email) ?? Promise.resolve();
    const write = previous.then(() => this.writeFile(email, state));
    this.writes.set(email, write);
    return write;
  }

  private async writeFile(email: string, state: WorkerState): Promise<void> {
    const filePath = this.filePath(email);
    const tmpPath = `${filePath}.tmp`;

    try {
      await fs.promises.writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf8');
      await fs.promises.rename(tmpPath, filePath);
    } catch (error) {
      this.logger.error({ err: error, file: filePath }, 'Failed to persist worker state');
    }
  }
}
