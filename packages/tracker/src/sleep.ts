import { setTimeout as delay } from 'node:timers/promises';

/**
 * Waits `ms` milliseconds unless `signal` aborts first.
 *
 * Resolves true when the full wait elapsed and false when it was cut short.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const abortableSleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) {
    return false;
  }

  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return false;
    }
    throw error;
  }
};
