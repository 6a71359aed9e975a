import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { DebugArtifact, DebugConfig } from './types';
import { ConfigurationError } from './errors';
import { formatTimestamp } from './dates';
import type { SiteDriver } from './site-driver';

const ARTIFACT_EXTENSIONS = ['.png', '.html'];

/**
 * Screenshots and page sources written under the logs directory as
 * `<prefix>_<yyyyMMdd_HHmmss>.<ext>`. With debug mode off only a log line is emitted.
 */
export class DebugArtifacts {
  private readonly dir: string;
  private readonly debug: DebugConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(dir: string, debug: DebugConfig, logger: Logger, now: () => Date = () => new Date()) {
    this.dir = dir;
    this.debug = debug;
    this.logger = logger;
    this.now = now;
  }

  /** Creates the logs directory and clears captures from earlier runs. */
  prepare(): void {
    try {
      fs.mkdirSync(this.dir, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(`Cannot create logs directory ${this.dir}`, { cause: error });
    }
    this.purge();
  }

  purge(): number {
    let removed = 0;
    for (const file of fs.readdirSync(this.dir)) {
      if (!ARTIFACT_EXTENSIONS.includes(path.extname(file))) {
        continue;
      }
      try {
        fs.rmSync(path.join(this.dir, file));
        removed += 1;
      } catch (error) {
        this.logger.warn({ err: error, file }, 'Could not remove old capture');
      }
    }

    if (removed > 0) {
      this.logger.info({ removed, dir: this.dir }, 'Removed old debug captures');
    }
    return removed;
  }

  async capture(driver: SiteDriver | null, prefix: string): Promise<DebugArtifact | null> {
    const timestamp = formatTimestamp(this.now());
    const url = driver ? await driver.currentUrl().catch(() => 'unavailable') : 'no session';

    if (!this.debug.enabled) {
      const fields = { prefix, url };
      if (prefix.includes('error')) {
        this.logger.error(fields, 'Failure context');
      } else {
        this.logger.info(fields, 'Capture point');
      }
      return null;
    }

    const artifact: DebugArtifact = { timestamp, prefix, url };
    if (!driver) {
      this.logger.warn({ prefix }, 'No session to capture');
      return artifact;
    }

    const base = path.join(this.dir, `${prefix}_${timestamp}`);

    if (this.debug.saveScreenshots) {
      try {
        await driver.screenshot(`${base}.png`);
        artifact.screenshotPath = `${base}.png`;
      } catch (error) {
        this.logger.warn({ err: error, prefix }, 'Screenshot failed');
      }
    }

    if (this.debug.saveHtml) {
      try {
        await fs.promises.writeFile(`${base}.html`, await driver.content(), 'utf-8');
        artifact.pageSourcePath = `${base}.html`;
      } catch (error) {
        this.logger.warn({ err: error, prefix }, 'Page source capture failed');
      }
    }

    this.logger.info({ ...artifact }, 'Debug capture saved');
    return artifact;
  }
}
