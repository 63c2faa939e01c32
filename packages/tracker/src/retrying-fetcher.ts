/**
 * @fileoverview Bounded exponential-backoff retry around a quote source.
 *
 * @module @price-sentinel/tracker/retrying-fetcher
 */

import { FetchError, QuoteSourceError, type Quote, type QuoteSource } from '@price-sentinel/contracts';
import { startTimer, type Logger } from '@price-sentinel/logger';
import { abortableSleep, type Sleep } from './sleep.js';

export interface RetryingFetcherOptions {
  /**
   * Retries after the first attempt.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Delay before the second attempt; doubles for each attempt after it.
   * @default 1000
   */
  baseDelayMs?: number;

  /** Upper bound on a single backoff delay; unset means uncapped */
  maxDelayMs?: number;

  sleep?: Sleep;
}

export type FetchOutcome =
  | { ok: true; quote: Quote; attempts: number }
  | { ok: false; error: FetchError };

/** Cumulative counters since construction */
export interface FetchStats {
  attempts: number;
  failures: number;
  exhausted: number;
}

/**
 * Calls the quote source up to `maxRetries + 1` times.
 *
 * Never rejects: every failure, including an abort during backoff, comes
 * back as `{ ok: false, error }` and the caller decides what to skip.
 *
 * @example
 * ```typescript
 * const fetcher = new RetryingFetcher(new YahooQuoteSource(), logger, { maxRetries: 3 });
 * const outcome = await fetcher.fetch('BTC-USD', controller.signal);
 * if (outcome.ok) {
 *   history.record({ timestamp: Date.now(), price: outcome.quote.price });
 * }
 * ```
 */
export class RetryingFetcher {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number | undefined;

  private readonly source: QuoteSource;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly counters: FetchStats = { attempts: 0, failures: 0, exhausted: 0 };

  constructor(source: QuoteSource, logger: Logger, options: RetryingFetcherOptions = {}) {
    this.source = source;
    this.logger = logger;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs;
    this.sleep = options.sleep ?? abortableSleep;

    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${this.maxRetries}`);
    }
    if (!(this.baseDelayMs >= 0)) {
      throw new RangeError(`baseDelayMs must be non-negative, got ${this.baseDelayMs}`);
    }
  }

  /**
   * Delay before attempt `attempt` (1-based): none before the first,
   * `baseDelayMs * 2^(attempt - 2)` after that, capped by `maxDelayMs`.
   */
  backoffDelay(attempt: number): number {
    if (attempt < 2) {
      return 0;
    }
    const delayMs = this.baseDelayMs * Math.pow(2, attempt - 2);
    return this.maxDelayMs === undefined ? delayMs : Math.min(delayMs, this.maxDelayMs);
  }

  async fetch(symbol: string, signal?: AbortSignal): Promise<FetchOutcome> {
    const maxAttempts = this.maxRetries + 1;
    let lastCause: unknown = null;
    let issued = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const delayMs = this.backoffDelay(attempt);
        this.logger.debug('Backing off before retry', { symbol, attempt, delay_ms: delayMs });
        const completed = await this.sleep(delayMs, signal);
        if (!completed) {
          return this.fail(symbol, issued, lastCause, true);
        }
      }

      if (signal?.aborted) {
        return this.fail(symbol, issued, lastCause, true);
      }

      issued = attempt;
      this.counters.attempts++;
      this.logger.debug('Fetch attempt', { symbol, attempt, max_attempts: maxAttempts, provider: this.source.id });

      const timer = startTimer();
      try {
        const quote = await this.source.getQuote(symbol);
        if (!Number.isFinite(quote.price) || quote.price <= 0) {
          throw new QuoteSourceError(`Invalid price: ${quote.price}`, { symbol, provider: this.source.id });
        }

        this.logger.debug('Quote received', { symbol, price: quote.price, attempt, duration_ms: timer.stop() });
        return { ok: true, quote, attempts: attempt };
      } catch (error) {
        lastCause = error;
        this.counters.failures++;
        this.logger.warn('Fetch attempt failed', {
          symbol,
          attempt,
          max_attempts: maxAttempts,
          duration_ms: timer.stop(),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return this.fail(symbol, issued, lastCause, false);
  }

  stats(): FetchStats {
    return { ...this.counters };
  }

  private fail(symbol: string, attempts: number, lastCause: unknown, aborted: boolean): FetchOutcome {
    const message = aborted
      ? `Fetch for ${symbol} stopped after ${attempts} attempt(s)`
      : `Failed to fetch ${symbol} after ${attempts} attempt(s)`;
    const error = new FetchError(message, { symbol, attempts, lastCause, aborted });

    if (!aborted) {
      this.counters.exhausted++;
      this.logger.error('All fetch attempts failed', { error: error.toJSON() });
    }

    return { ok: false, error };
  }
}
