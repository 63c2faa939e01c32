/**
 * @fileoverview Tests for retry count, backoff schedule and abort handling.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { isFetchError, isSentinelError } from '@price-sentinel/contracts';
import { createCaptureLogger, flush, type CaptureStream } from '@price-sentinel/logger/testing';
import type { Logger } from '@price-sentinel/logger';
import { RetryingFetcher } from '../src/retrying-fetcher.js';
import { abortableSleep } from '../src/sleep.js';
import { FakeTime, ScriptedSource } from './fakes.js';

describe('RetryingFetcher', () => {
  let time: FakeTime;
  let logger: Logger;
  let capture: CaptureStream;

  beforeEach(() => {
    time = new FakeTime();
    ({ logger, capture } = createCaptureLogger());
  });

  it('should return the first successful quote without waiting', async () => {
    const fetcher = new RetryingFetcher(new ScriptedSource([101.5]), logger, { sleep: time.sleep });

    const outcome = await fetcher.fetch('BTC-USD');

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.quote.price).toBe(101.5);
      expect(outcome.attempts).toBe(1);
    }
    expect(time.sleeps).toEqual([]);
  });

  it('should make max retries plus one attempts with doubling delays', async () => {
    const source = new ScriptedSource([new Error('timeout of 10000ms exceeded')]);
    const fetcher = new RetryingFetcher(source, logger, { sleep: time.sleep });

    const outcome = await fetcher.fetch('BTC-USD');

    expect(source.calls).toBe(4);
    expect(time.sleeps).toEqual([1000, 2000, 4000]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(isFetchError(outcome.error)).toBe(true);
      expect(outcome.error.attempts).toBe(4);
      expect(outcome.error.aborted).toBe(false);
      expect(outcome.error.lastCause).toBeInstanceOf(Error);
      expect(outcome.error.message).toBe('Failed to fetch BTC-USD after 4 attempt(s)');
    }
    expect(fetcher.stats()).toEqual({ attempts: 4, failures: 4, exhausted: 1 });
  });

  it('should stop retrying once an attempt succeeds', async () => {
    const source = new ScriptedSource([new Error('ECONNRESET'), new Error('ECONNRESET'), 99.25]);
    const fetcher = new RetryingFetcher(source, logger, { sleep: time.sleep });

    const outcome = await fetcher.fetch('BTC-USD');

    expect(outcome.ok && outcome.attempts).toBe(3);
    expect(time.sleeps).toEqual([1000, 2000]);
    expect(fetcher.stats()).toEqual({ attempts: 3, failures: 2, exhausted: 0 });
  });

  it('should log every failed attempt at warn', async () => {
    const source = new ScriptedSource([new Error('ECONNRESET'), 99.25]);
    const fetcher = new RetryingFetcher(source, logger, { sleep: time.sleep });

    await fetcher.fetch('BTC-USD');
    await flush();

    expect(capture.messages('warn')).toEqual(['Fetch attempt failed']);
    expect(capture.messages('debug')).toContain('Fetch attempt');
  });

  it('should scale delays by the base delay and cap them', () => {
    const fetcher = new RetryingFetcher(new ScriptedSource([1]), logger, { baseDelayMs: 250, maxDelayMs: 600 });

    expect([1, 2, 3, 4, 5].map((attempt) => fetcher.backoffDelay(attempt))).toEqual([0, 250, 500, 600, 600]);
  });

  it('should make a single attempt with zero retries', async () => {
    const source = new ScriptedSource([new Error('down')]);
    const fetcher = new RetryingFetcher(source, logger, { maxRetries: 0, sleep: time.sleep });

    const outcome = await fetcher.fetch('BTC-USD');

    expect(outcome.ok).toBe(false);
    expect(source.calls).toBe(1);
    expect(time.sleeps).toEqual([]);
  });

  it('should treat a non-positive price as a failed attempt', async () => {
    const fetcher = new RetryingFetcher(new ScriptedSource([0]), logger, { maxRetries: 0, sleep: time.sleep });

    const outcome = await fetcher.fetch('BTC-USD');

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(isSentinelError(outcome.error.lastCause)).toBe(true);
      expect(outcome.error.data?.['lastCause']).toBe('QuoteSourceError: Invalid price: 0');
    }
  });

  it('should give up when the stop signal aborts a backoff wait', async () => {
    const controller = new AbortController();
    const source = new ScriptedSource([new Error('ECONNRESET')]);
    source.onQuote = () => controller.abort();
    const fetcher = new RetryingFetcher(source, logger, { sleep: time.sleep });

    const outcome = await fetcher.fetch('BTC-USD', controller.signal);

    expect(source.calls).toBe(1);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.aborted).toBe(true);
      expect(outcome.error.attempts).toBe(1);
      expect(outcome.error.message).toBe('Fetch for BTC-USD stopped after 1 attempt(s)');
    }
    expect(fetcher.stats().exhausted).toBe(0);
  });

  it('should not call the source when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new ScriptedSource([100]);
    const fetcher = new RetryingFetcher(source, logger, { sleep: time.sleep });

    const outcome = await fetcher.fetch('BTC-USD', controller.signal);

    expect(outcome.ok).toBe(false);
    expect(source.calls).toBe(0);
  });

  it('should reject invalid retry settings', () => {
    expect(() => new RetryingFetcher(new ScriptedSource([1]), logger, { maxRetries: -1 })).toThrow(RangeError);
  });
});

describe('abortableSleep', () => {
  it('should resolve true after a full wait', async () => {
    expect(await abortableSleep(1)).toBe(true);
  });

  it('should resolve false when aborted mid-wait', async () => {
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);

    controller.abort();

    expect(await pending).toBe(false);
  });

  it('should resolve false immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await abortableSleep(60_000, controller.signal)).toBe(false);
  });
});
