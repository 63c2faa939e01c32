/**
 * @fileoverview Lightweight timers for logging operation durations.
 */

import { performance } from 'node:perf_hooks';

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start, rounded; keeps running */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the rounded duration */
  stop(): number;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const quote = await source.getQuote('BTC-USD');
 * logger.debug('Quote received', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },
  };
}
