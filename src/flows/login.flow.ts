import { FlowContext, FlowDefinition } from '../types';
import { waitForLoginSuccess } from '../auth';
import { LoginFailedError } from '../errors';
import { firstSuccess } from '../probes';
import { SELECTORS, TIMEOUTS } from '../selectors';
import { target } from '../site-driver';
import { requireDriver, requireUser } from '../flow-runner';

function budget(ctx: FlowContext, timeoutMs: number): number {
  return Math.min(timeoutMs, ctx.config.globalTimeout);
}

/** The portal sometimes shows an "important information" panel above the form. */
async function dismissImportantInfo(ctx: FlowContext): Promise<void> {
  const driver = requireDriver(ctx);
  const timeoutMs = budget(ctx, TIMEOUTS.IMPORTANT_INFO);

  const hit = await firstSuccess<true>(
    [
      {
        name: 'down-arrow',
        run: async () => {
          if (!(await driver.waitFor(SELECTORS.IMPORTANT_INFO_ARROW, { timeoutMs }))) {
            return null;
          }
          await driver.click(target(SELECTORS.IMPORTANT_INFO_ARROW), { timeoutMs });
          return true;
        },
      },
      {
        name: 'page-header',
        run: async () => ((await driver.waitFor(SELECTORS.PAGE_HEADER, { timeoutMs })) ? true : null),
      },
    ],
    { logger: ctx.logger, label: 'important-info' }
  );

  ctx.logger.debug({ via: hit?.name ?? 'none' }, 'Important info step done');
}

async function acceptPrivacyPolicy(ctx: FlowContext): Promise<void> {
  const driver = requireDriver(ctx);
  const timeoutMs = budget(ctx, TIMEOUTS.CONSENT_CHECKBOX);
  const checkbox = target(SELECTORS.POLICY_CHECKBOX);

  try {
    if (!(await driver.waitFor(checkbox, { timeoutMs, state: 'attached' }))) {
      ctx.logger.debug('Privacy policy checkbox not present');
      return;
    }

    if (await driver.isChecked(checkbox, timeoutMs)) {
      return;
    }

    await driver.click(checkbox, { timeoutMs, settleMs: TIMEOUTS.SCROLL_SETTLE });
    ctx.logger.debug('Privacy policy accepted');
  } catch (error) {
    ctx.logger.warn({ err: error }, 'Could not tick privacy policy checkbox, continuing');
  }
}

export const loginFlow: FlowDefinition = {
  name: 'login',
  description: 'Sign in to the appointment portal',
  steps: [
    {
      name: 'open-sign-in',
      description: 'Open the sign-in page.',
      action: async (ctx) => {
        await requireDriver(ctx).goto(`${ctx.config.site.baseUrl}/users/sign_in`);
      },
    },
    {
      name: 'dismiss-important-info',
      description: 'Close the important-information panel if it is shown.',
      action: async (ctx) => {
        await dismissImportantInfo(ctx);
      },
    },
    {
      name: 'fill-credentials',
      description: 'Wait for the sign-in form and fill in email and password.',
      action: async (ctx) => {
        const driver = requireDriver(ctx);
        const user = requireUser(ctx);

        const formShown = await driver.waitFor(SELECTORS.SIGN_IN_FORM, {
          timeoutMs: budget(ctx, TIMEOUTS.LOGIN_FORM),
        });
        if (!formShown) {
          throw new LoginFailedError('Login form did not appear.');
        }

        const timeoutMs = budget(ctx, TIMEOUTS.CLICKABLE);
        await driver.fill(target(SELECTORS.EMAIL_INPUT), user.email, timeoutMs);
        await driver.fill(target(SELECTORS.PASSWORD_INPUT), user.password, timeoutMs);
      },
    },
    {
      name: 'accept-privacy-policy',
      description: 'Tick the privacy policy checkbox when present.',
      action: async (ctx) => {
        await acceptPrivacyPolicy(ctx);
      },
    },
    {
      name: 'submit-login',
      description: 'Submit the sign-in form.',
      action: async (ctx) => {
        await requireDriver(ctx).click(target(SELECTORS.SIGN_IN_SUBMIT), {
          timeoutMs: budget(ctx, TIMEOUTS.CLICKABLE),
        });
      },
    },
    {
      name: 'wait-for-login-success',
      description: 'Wait until the portal lands on the account group page.',
      action: async (ctx) => {
        await waitForLoginSuccess(requireDriver(ctx), ctx.config, ctx.logger);
      },
    },
  ],
};
