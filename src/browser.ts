import { chromium, Browser, BrowserContext, Locator, Page } from 'playwright-core';
import type { Logger } from 'pino';
import { AppConfig } from './types';
import { SessionUnavailableError, describeError } from './errors';
import { ClickOptions, ElementTarget, SiteDriver, WaitOptions, toTarget } from './site-driver';
import type { SessionFactory } from './session-registry';

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close: () => Promise<void>;
}

export async function launchBrowser(config: AppConfig): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: config.headless,
    slowMo: config.slowMo,
    executablePath: config.browserExecutablePath || undefined,
    args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-notifications'],
  });

  const context = await browser.newContext({
    viewport: { width: 1920, height: 1080 },
  });
  context.setDefaultTimeout(config.globalTimeout);

  const page = await context.newPage();

  return {
    browser,
    context,
    page,
    close: async () => {
      await context.close().catch(() => undefined);
      await browser.close().catch(() => undefined);
    },
  };
}

export function isMissingBrowserError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return message.includes('executable doesn') || message.includes('playwright install');
}

export class PlaywrightSiteDriver implements SiteDriver {
  readonly key: string;
  private session: BrowserSession;
  private logger: Logger;

  constructor(key: string, session: BrowserSession, logger: Logger) {
    this.key = key;
    this.session = session;
    this.logger = logger;
  }

  private get page(): Page {
    return this.session.page;
  }

  private locate(value: ElementTarget): Locator {
    return this.page.locator(value.selector).nth(value.index ?? 0);
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async currentUrl(): Promise<string> {
    // Round-trips to the renderer, so a dead browser fails here.
    return this.page.evaluate(() => window.location.href);
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async texts(selector: string): Promise<string[]> {
    return this.page.locator(selector).allInnerTexts();
  }

  async textOf(value: ElementTarget, timeoutMs: number): Promise<string> {
    return this.locate(value).innerText({ timeout: timeoutMs });
  }

  async attributeOf(value: ElementTarget, name: string, timeoutMs: number): Promise<string | null> {
    return this.locate(value).getAttribute(name, { timeout: timeoutMs });
  }

  async waitFor(value: ElementTarget | string, options: WaitOptions): Promise<boolean> {
    return this.locate(toTarget(value))
      .waitFor({ state: options.state ?? 'visible', timeout: options.timeoutMs })
      .then(
        () => true,
        () => false
      );
  }

  async waitForUrl(fragment: string, timeoutMs: number): Promise<boolean> {
    return this.page
      .waitForURL((url) => url.href.includes(fragment), {
        timeout: timeoutMs,
        waitUntil: 'domcontentloaded',
      })
      .then(
        () => true,
        () => false
      );
  }

  async fill(value: ElementTarget, text: string, timeoutMs: number): Promise<void> {
    const field = this.locate(value);
    await field.fill('', { timeout: timeoutMs });
    await field.fill(text, { timeout: timeoutMs });
  }

  async isChecked(value: ElementTarget, timeoutMs: number): Promise<boolean> {
    return this.locate(value).isChecked({ timeout: timeoutMs });
  }

  async click(value: ElementTarget, options: ClickOptions): Promise<void> {
    const element = this.locate(value);
    const block = options.block ?? 'start';

    await element.evaluate((el, position) => el.scrollIntoView({ block: position }), block, {
      timeout: options.timeoutMs,
    });
    if (options.settleMs) {
      await this.page.waitForTimeout(options.settleMs);
    }

    try {
      await element.click({ timeout: options.timeoutMs });
    } catch (error) {
      // Overlays intercept pointer clicks on this portal; a DOM click still fires the handler.
      this.logger.debug({ err: error, selector: value.selector }, 'Pointer click failed, using DOM click');
      await element.evaluate(
        (el) => {
          if (el instanceof HTMLElement) {
            el.click();
          }
        },
        undefined,
        { timeout: options.timeoutMs }
      );
    }
  }

  async selectOption(value: ElementTarget, optionValue: string, timeoutMs: number): Promise<void> {
    await this.locate(value).selectOption(optionValue, { timeout: timeoutMs });
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}

export function createBrowserSessionFactory(config: AppConfig, logger: Logger): SessionFactory {
  return async (key: string) => {
    logger.info({ key, headless: config.headless }, 'Launching browser');
    try {
      const session = await launchBrowser(config);
      return new PlaywrightSiteDriver(key, session, logger.child({ session: key }));
    } catch (error) {
      const message = isMissingBrowserError(error)
        ? 'Browser executable is missing. Run: npx playwright-core install chromium'
        : `Failed to launch browser: ${describeError(error)}`;
      throw new SessionUnavailableError(message, { cause: error });
    }
  };
}
