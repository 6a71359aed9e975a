import type { Logger } from 'pino';
import { SELECTORS } from './selectors';
import type { SiteDriver } from './site-driver';

export function containsBusyMarker(text: string, markers: string[]): boolean {
  const haystack = text.toLowerCase();
  return markers.some((marker) => marker.length > 0 && haystack.includes(marker.toLowerCase()));
}

/**
 * Looks for an overload notice in the inline error regions, then in the whole page.
 * A page that cannot be read is treated as not busy.
 */
export async function isSystemBusy(
  driver: SiteDriver,
  markers: string[],
  logger?: Logger
): Promise<boolean> {
  try {
    for (const selector of [SELECTORS.ERROR_MESSAGE, SELECTORS.ALERT]) {
      const texts = await driver.texts(selector);
      if (texts.some((text) => containsBusyMarker(text, markers))) {
        logger?.info({ selector }, 'System busy notice detected');
        return true;
      }
    }

    const content = await driver.content();
    if (containsBusyMarker(content, markers)) {
      logger?.info('System busy message detected in page content');
      return true;
    }
  } catch (error) {
    logger?.debug({ err: error }, 'Busy check failed');
  }

  return false;
}
