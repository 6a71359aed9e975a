import type { Logger } from 'pino';

export interface Probe<T> {
  name: string;
  run: () => Promise<T | null | undefined>;
}

export interface ProbeHit<T> {
  name: string;
  value: T;
}

export interface FirstSuccessOptions {
  logger?: Logger;
  label?: string;
  /** Errors matching this predicate stop the chain and propagate. */
  isFatal?: (error: unknown) => boolean;
}

/**
 * Runs `probes` in order and returns the first one that yields a value. A probe that
 * resolves to null/undefined or throws is skipped.
 */
export async function firstSuccess<T>(
  probes: Probe<T>[],
  options: FirstSuccessOptions = {}
): Promise<ProbeHit<T> | null> {
  const { logger, label, isFatal } = options;

  for (const probe of probes) {
    try {
      logger?.debug({ chain: label, probe: probe.name }, 'Trying probe');
      const value = await probe.run();
      if (value !== null && value !== undefined) {
        logger?.debug({ chain: label, probe: probe.name }, 'Probe succeeded');
        return { name: probe.name, value };
      }
    } catch (error) {
      if (isFatal?.(error)) {
        throw error;
      }
      logger?.debug({ chain: label, probe: probe.name, err: error }, 'Probe failed');
    }
  }

  logger?.debug({ chain: label }, 'All probes exhausted');
  return null;
}
