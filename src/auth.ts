import type { Logger } from 'pino';
import { AppConfig } from './types';
import { LoginFailedError } from './errors';
import { SELECTORS, TIMEOUTS } from './selectors';
import type { SiteDriver } from './site-driver';

export function isLoginUrl(url: string, markers: string[]): boolean {
  return markers.some((marker) => marker.length > 0 && url.includes(marker));
}

export async function hasLoginForm(driver: SiteDriver): Promise<boolean> {
  if ((await driver.count(SELECTORS.SIGN_IN_FORM)) > 0) {
    return true;
  }

  const [emailFields, passwordFields] = await Promise.all([
    driver.count(SELECTORS.EMAIL_INPUT),
    driver.count(SELECTORS.PASSWORD_INPUT),
  ]);
  return emailFields > 0 && passwordFields > 0;
}

/**
 * True when the site has bounced us back to sign-in. Read failures count as "not on
 * the login page"; callers treat this as a hint, not a verdict.
 */
export async function isOnLoginPage(
  driver: SiteDriver,
  config: AppConfig,
  logger?: Logger
): Promise<boolean> {
  try {
    const url = await driver.currentUrl();
    if (isLoginUrl(url, config.site.loginUrlMarkers)) {
      logger?.debug({ url }, 'Login URL detected');
      return true;
    }

    if (await hasLoginForm(driver)) {
      logger?.debug({ url }, 'Login form detected');
      return true;
    }
  } catch (error) {
    logger?.debug({ err: error }, 'Login page check failed');
  }

  return false;
}

export async function waitForLoginSuccess(
  driver: SiteDriver,
  config: AppConfig,
  logger?: Logger
): Promise<void> {
  const marker = config.site.postLoginUrlMarker;
  const timeoutMs = Math.min(TIMEOUTS.POST_LOGIN, config.globalTimeout);

  if (await driver.waitForUrl(marker, timeoutMs)) {
    logger?.debug({ marker }, 'Post-login URL reached');
    return;
  }

  const url = await driver.currentUrl().catch(() => 'unknown');
  logger?.debug({ url, marker }, 'Login success check timed out');
  throw new LoginFailedError(`Login did not complete before timeout (still at ${url}).`);
}
