import type { Logger } from 'pino';
import type { SiteDriver } from './site-driver';

export type SessionFactory = (key: string) => Promise<SiteDriver>;

/**
 * Owns at most one live browser session per key. Work on a key is serialized through a
 * promise chain, so concurrent `acquire` calls for the same key share one session.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SiteDriver>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly factory: SessionFactory;
  private readonly logger: Logger;

  constructor(factory: SessionFactory, logger: Logger) {
    this.factory = factory;
    this.logger = logger;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(key: string): boolean {
    return this.sessions.has(key);
  }

  /**
   * Returns the live session for `key`, replacing it when it no longer responds.
   * Creation failures propagate to the caller.
   */
  async acquire(key: string): Promise<SiteDriver> {
    return this.withLock(key, async () => {
      const existing = this.sessions.get(key);
      if (existing) {
        if (await this.isResponsive(existing)) {
          return existing;
        }

        this.logger.info({ key }, 'Existing session not responsive, creating a new one');
        await this.dispose(key, existing);
      }

      const driver = await this.factory(key);
      this.sessions.set(key, driver);
      this.logger.debug({ key }, 'Session created');
      return driver;
    });
  }

  async close(key: string): Promise<void> {
    await this.withLock(key, async () => {
      const existing = this.sessions.get(key);
      if (existing) {
        await this.dispose(key, existing);
      }
    });
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((key) => this.close(key)));
  }

  private async isResponsive(driver: SiteDriver): Promise<boolean> {
    try {
      await driver.currentUrl();
      return true;
    } catch (error) {
      this.logger.debug({ err: error, key: driver.key }, 'Session liveness probe failed');
      return false;
    }
  }

  private async dispose(key: string, driver: SiteDriver): Promise<void> {
    this.sessions.delete(key);
    try {
      await driver.close();
      this.logger.info({ key }, 'Browser closed');
    } catch (error) {
      this.logger.error({ err: error, key }, 'Error closing browser');
    }
  }

  private async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(work);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }
}
