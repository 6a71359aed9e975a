import { FlowContext, FlowDefinition } from '../types';
import { isOnLoginPage } from '../auth';
import { NavigationError, SessionExpiredError, SlotwatchError, isSessionExpired } from '../errors';
import { ProbeHit, firstSuccess } from '../probes';
import { SELECTORS, TEXT, TIMEOUTS, linkContainingText, linkWithText } from '../selectors';
import { ElementTarget, SiteDriver, target, within } from '../site-driver';
import { requireDriver, requireUser } from '../flow-runner';

export type PageKind = 'reschedule' | 'login' | 'group' | 'unknown';

export interface RescheduleProgress {
  page: PageKind;
}

function budget(ctx: FlowContext, timeoutMs: number): number {
  return Math.min(timeoutMs, ctx.config.globalTimeout);
}

export async function classifyPage(driver: SiteDriver, ctx: FlowContext): Promise<PageKind> {
  const url = await driver.currentUrl();

  if (url.includes('reschedule')) {
    return 'reschedule';
  }
  if (url.includes('appointment') && (await driver.count(SELECTORS.FACILITY_SELECT)) > 0) {
    return 'reschedule';
  }
  if (await isOnLoginPage(driver, ctx.config, ctx.logger)) {
    return 'login';
  }
  if (url.includes(ctx.config.site.postLoginUrlMarker)) {
    return 'group';
  }
  if (url.includes('/schedule') && (await driver.count(SELECTORS.ACCORDION)) === 0) {
    return 'group';
  }

  return 'unknown';
}

/** Index of the first application card that carries the account number, if any. */
export async function findMatchingCard(
  driver: SiteDriver,
  ivrNumber: string
): Promise<ElementTarget | null> {
  const label = `${TEXT.IVR_LABEL} ${ivrNumber}`;
  const cards = await driver.texts(SELECTORS.APPLICATION_CARD);
  const index = cards.findIndex((text) => text.includes(label));
  return index >= 0 ? target(SELECTORS.APPLICATION_CARD, index) : null;
}

async function presentTarget(driver: SiteDriver, selector: string): Promise<ElementTarget | null> {
  return (await driver.count(selector)) > 0 ? target(selector) : null;
}

async function findCardContinue(
  ctx: FlowContext,
  driver: SiteDriver,
  card: ElementTarget
): Promise<ProbeHit<ElementTarget> | null> {
  return firstSuccess<ElementTarget>(
    [
      { name: 'card-styled-button', run: () => presentTarget(driver, within(card, SELECTORS.STYLED_BUTTON)) },
      { name: 'card-link-text', run: () => presentTarget(driver, within(card, linkWithText(TEXT.CONTINUE))) },
      { name: 'page-link-text', run: () => presentTarget(driver, linkWithText(TEXT.CONTINUE)) },
      { name: 'card-first-link', run: () => presentTarget(driver, within(card, SELECTORS.ANY_LINK)) },
    ],
    { logger: ctx.logger, label: 'card-continue' }
  );
}

async function findPageContinue(
  ctx: FlowContext,
  driver: SiteDriver
): Promise<ProbeHit<ElementTarget> | null> {
  const timeoutMs = budget(ctx, TIMEOUTS.CONTINUE_PROBE);

  const visible = async (selector: string): Promise<ElementTarget | null> => {
    if (await driver.waitFor(selector, { timeoutMs })) {
      return target(selector);
    }
    if (await isOnLoginPage(driver, ctx.config, ctx.logger)) {
      throw new SessionExpiredError('Redirected to sign-in while looking for Continue.');
    }
    return null;
  };

  return firstSuccess<ElementTarget>(
    [
      { name: 'link-text', run: () => visible(linkWithText(TEXT.CONTINUE)) },
      { name: 'partial-link-text', run: () => visible(linkContainingText(TEXT.CONTINUE)) },
      {
        name: 'styled-button',
        run: async () => {
          const texts = await driver.texts(SELECTORS.STYLED_BUTTON);
          const index = texts.findIndex((text) => text.includes(TEXT.CONTINUE));
          return index >= 0 ? target(SELECTORS.STYLED_BUTTON, index) : null;
        },
      },
      {
        name: 'all-links-scan',
        run: async () => {
          const texts = await driver.texts(SELECTORS.ANY_LINK);
          const index = texts.findIndex((text) => text.trim() === TEXT.CONTINUE);
          return index >= 0 ? target(SELECTORS.ANY_LINK, index) : null;
        },
      },
    ],
    { logger: ctx.logger, label: 'page-continue', isFatal: isSessionExpired }
  );
}

/**
 * Locates the "Continue" control for the configured account. A card matching the
 * account number is preferred; otherwise the page-level chain runs.
 */
export async function findContinueTarget(ctx: FlowContext): Promise<ProbeHit<ElementTarget>> {
  const driver = requireDriver(ctx);
  const user = requireUser(ctx);

  const cardsShown = await driver.waitFor(SELECTORS.APPLICATION_CARD, {
    timeoutMs: budget(ctx, TIMEOUTS.CARDS),
    state: 'attached',
  });

  if (cardsShown && user.ivrNumber) {
    const card = await findMatchingCard(driver, user.ivrNumber);
    if (card) {
      ctx.logger.debug({ card: card.index, ivr: user.ivrNumber }, 'Matched application card');
      const hit = await findCardContinue(ctx, driver, card);
      if (hit) {
        return hit;
      }
    } else {
      ctx.logger.info({ ivr: user.ivrNumber }, 'No application card matches account number');
    }
  }

  if (await isOnLoginPage(driver, ctx.config, ctx.logger)) {
    throw new SessionExpiredError('Redirected to sign-in while looking for Continue.');
  }

  const hit = await findPageContinue(ctx, driver);
  if (hit) {
    return hit;
  }

  await ctx.debug?.('continue_search_failed');
  throw new NavigationError('Could not find the Continue button.');
}

async function failNavigation(ctx: FlowContext, message: string, cause?: unknown): Promise<never> {
  const driver = requireDriver(ctx);
  if (await isOnLoginPage(driver, ctx.config, ctx.logger)) {
    throw new SessionExpiredError(`Redirected to sign-in: ${message}`, { cause });
  }

  await ctx.debug?.('reschedule_action_error');
  throw new NavigationError(message, { cause });
}

async function openRescheduleAction(ctx: FlowContext): Promise<void> {
  const driver = requireDriver(ctx);
  const clickOptions = {
    timeoutMs: budget(ctx, TIMEOUTS.CLICKABLE),
    settleMs: TIMEOUTS.SCROLL_SETTLE,
    block: 'center' as const,
  };

  if (!(await driver.waitFor(SELECTORS.ACCORDION, { timeoutMs: budget(ctx, TIMEOUTS.ACCORDION) }))) {
    await failNavigation(ctx, 'Account actions did not appear.');
  }

  const titles = await driver.texts(SELECTORS.ACCORDION_TITLE);
  const index = titles.findIndex((text) => text.includes(TEXT.RESCHEDULE_ACCORDION));
  if (index < 0) {
    await failNavigation(ctx, 'Reschedule Appointment action not found.');
  }

  await driver.click(target(SELECTORS.ACCORDION_TITLE, index), clickOptions);

  const content = target(SELECTORS.RESCHEDULE_CONTENT);
  if (!(await driver.waitFor(content, { timeoutMs: budget(ctx, TIMEOUTS.ACCORDION) }))) {
    await failNavigation(ctx, 'Reschedule action did not expand.');
  }

  const button = within(content, SELECTORS.RESCHEDULE_BUTTON);
  if ((await driver.count(button)) === 0) {
    await failNavigation(ctx, 'Reschedule button not found.');
  }

  await driver.click(target(button), clickOptions);
}

export function createRescheduleFlow(progress: RescheduleProgress): FlowDefinition {
  return {
    name: 'reschedule',
    description: 'Navigate from the account group page to the reschedule form',
    steps: [
      {
        name: 'inspect-current-page',
        description: 'Work out where the session currently is.',
        action: async (ctx) => {
          const driver = requireDriver(ctx);
          progress.page = await classifyPage(driver, ctx);
          ctx.logger.debug({ page: progress.page }, 'Current page classified');

          if (progress.page === 'login') {
            throw new SessionExpiredError('Session is on the sign-in page.');
          }
          if (progress.page === 'reschedule') {
            ctx.logger.info('Already on reschedule page');
            return 'halt';
          }
        },
      },
      {
        name: 'select-account',
        description: 'Pick the application card and press Continue.',
        action: async (ctx) => {
          if (progress.page !== 'group') {
            return;
          }

          const driver = requireDriver(ctx);
          const hit = await findContinueTarget(ctx);
          ctx.logger.debug({ via: hit.name }, 'Clicking Continue');
          await driver.click(hit.value, {
            timeoutMs: budget(ctx, TIMEOUTS.CLICKABLE),
            settleMs: TIMEOUTS.SCROLL_SETTLE,
            block: 'center',
          });
          await driver.pause(TIMEOUTS.NAVIGATION_SETTLE);
        },
      },
      {
        name: 'open-reschedule-action',
        description: 'Expand "Reschedule Appointment" and follow its button.',
        action: async (ctx) => {
          try {
            await openRescheduleAction(ctx);
          } catch (error) {
            if (error instanceof SlotwatchError) {
              throw error;
            }
            await failNavigation(ctx, 'Failed to open the reschedule action.', error);
          }
        },
      },
      {
        name: 'verify-reschedule-page',
        description: 'Wait for the facility selector of the reschedule form.',
        action: async (ctx) => {
          const driver = requireDriver(ctx);
          const loaded = await driver.waitFor(SELECTORS.FACILITY_SELECT, {
            timeoutMs: budget(ctx, TIMEOUTS.RESCHEDULE_PAGE),
          });
          if (!loaded) {
            await failNavigation(ctx, 'Reschedule page did not load.');
          }
          progress.page = 'reschedule';
        },
      },
    ],
  };
}
