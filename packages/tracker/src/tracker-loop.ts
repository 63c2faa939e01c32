/**
 * @fileoverview Fixed-cadence tracking loop.
 *
 * @module @price-sentinel/tracker/tracker-loop
 */

import { formatAlertMessage, type AlertEngine } from '@price-sentinel/alert-engine';
import {
  isOutOfOrderError,
  isSentinelError,
  type AudioCue,
  type Notifier,
  type PricePoint,
  type SessionSnapshot,
} from '@price-sentinel/contracts';
import { withCycleContext, type Logger } from '@price-sentinel/logger';
import type { PriceHistory, WindowedDrop } from '@price-sentinel/price-history';
import type { SessionStore } from '@price-sentinel/session-store';
import type { RetryingFetcher } from './retrying-fetcher.js';
import { abortableSleep, type Sleep } from './sleep.js';
import {
  TrackerPhase,
  type CycleResult,
  type StopReason,
  type TrackerDependencies,
  type TrackerOptions,
  type TrackerState,
  type TrackerSummary,
} from './types.js';

function usd(value: number): string {
  return `$${value.toFixed(2)}`;
}

function errorDetails(error: unknown): unknown {
  if (isSentinelError(error)) {
    return error.toJSON();
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Polls one instrument on a fixed cadence.
 *
 * Each cycle: fetch → record → SMA and windowed drop → evaluate → maybe
 * alert → maybe checkpoint. The loop is the only writer of the history,
 * the alert engine and its own {@link TrackerState}. Nothing inside a cycle
 * stops the loop; only the abort signal or the duration limit does.
 *
 * @example
 * ```typescript
 * const loop = new TrackerLoop({ ticker: 'BTC-USD' }, { fetcher, history, alerts, logger, sessionStore });
 * await loop.resume();
 * const summary = await loop.run(controller.signal);
 * ```
 */
export class TrackerLoop {
  readonly ticker: string;
  readonly smaPeriod: number;
  readonly alertWindowMinutes: number;
  readonly checkIntervalMs: number;
  readonly checkpointInterval: number;
  readonly maxDurationMs: number | null;

  private readonly fetcher: RetryingFetcher;
  private readonly history: PriceHistory;
  private readonly alerts: AlertEngine;
  private readonly logger: Logger;
  private readonly sessionStore: SessionStore | null;
  private readonly notifier: Notifier | null;
  private readonly audioCue: AudioCue | null;
  private readonly clock: () => number;
  private readonly sleep: Sleep;

  private readonly tracker: TrackerState = {
    phase: TrackerPhase.STOPPED,
    cycles: 0,
    successfulChecks: 0,
    failedFetches: 0,
    alertsFired: 0,
    notificationFailures: 0,
    checkpointSequence: 0,
    lastPrice: null,
    lastSma: null,
  };
  private running = false;

  constructor(options: TrackerOptions, deps: TrackerDependencies) {
    this.ticker = options.ticker;
    this.smaPeriod = options.smaPeriod ?? 10;
    this.alertWindowMinutes = options.alertWindowMinutes ?? 60;
    this.checkIntervalMs = options.checkIntervalMs ?? 60_000;
    this.checkpointInterval = options.checkpointInterval ?? 10;
    this.maxDurationMs = options.maxDurationMs ?? null;

    this.fetcher = deps.fetcher;
    this.history = deps.history;
    this.alerts = deps.alerts;
    this.logger = deps.logger.child({ component: 'tracker', symbol: options.ticker });
    this.sessionStore = deps.sessionStore ?? null;
    this.notifier = deps.notifier ?? null;
    this.audioCue = deps.audioCue ?? null;
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? abortableSleep;

    if (!(this.checkIntervalMs > 0)) {
      throw new RangeError(`checkIntervalMs must be positive, got ${this.checkIntervalMs}`);
    }
    if (!Number.isInteger(this.checkpointInterval) || this.checkpointInterval < 1) {
      throw new RangeError(`checkpointInterval must be a positive integer, got ${this.checkpointInterval}`);
    }
  }

  get phase(): TrackerPhase {
    return this.tracker.phase;
  }

  /** Copy of the loop's counters */
  get state(): Readonly<TrackerState> {
    return { ...this.tracker };
  }

  /**
   * Restores history, alert state and checkpoint sequence from the store.
   *
   * @returns Number of points restored, or null when starting fresh
   */
  async resume(): Promise<number | null> {
    if (this.sessionStore === null) {
      return null;
    }

    const snapshot = await this.sessionStore.load();
    if (snapshot === null) {
      return null;
    }

    try {
      this.history.replace(snapshot.prices);
    } catch (error) {
      this.logger.warn('Session history rejected, starting fresh', { error: errorDetails(error) });
      return null;
    }

    this.alerts.restore(snapshot.lastAlertTime);
    this.tracker.checkpointSequence = snapshot.checkpointSequenceNumber;
    this.tracker.lastPrice = this.history.latest()?.price ?? null;

    this.logger.info('Session resumed', {
      points: this.history.size,
      last_alert_time: snapshot.lastAlertTime === null ? null : new Date(snapshot.lastAlertTime).toISOString(),
      sequence: snapshot.checkpointSequenceNumber,
    });
    return this.history.size;
  }

  /**
   * Runs one fetch-evaluate cycle under its own cycle id.
   */
  runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const cycle = this.tracker.cycles + 1;
    return withCycleContext(() => this.cycle(signal), undefined, { cycle });
  }

  /**
   * Runs cycles until `signal` aborts or `maxDurationMs` elapses, then
   * writes a final snapshot.
   *
   * Cycles start on a fixed grid: the next start is the previous start plus
   * the interval. A cycle that overruns the interval is followed
   * immediately and the grid restarts from that moment.
   */
  async run(signal?: AbortSignal): Promise<TrackerSummary> {
    if (this.running) {
      throw new Error('Tracker loop is already running');
    }
    this.running = true;

    const startedAt = this.clock();
    const deadline = this.maxDurationMs === null ? null : startedAt + this.maxDurationMs;
    let nextStart = startedAt;
    let stopReason: StopReason = 'signal';

    this.tracker.phase = TrackerPhase.RUNNING;
    this.logger.info('Tracker started', {
      interval_ms: this.checkIntervalMs,
      max_duration_ms: this.maxDurationMs,
    });

    try {
      for (;;) {
        if (signal?.aborted) {
          stopReason = 'signal';
          this.logger.info('Tracking stopped by signal');
          break;
        }
        if (deadline !== null && this.clock() >= deadline) {
          stopReason = 'duration';
          this.logger.info('Duration limit reached', { max_duration_ms: this.maxDurationMs });
          break;
        }

        try {
          await this.runCycle(signal);
        } catch (error) {
          this.tracker.phase = TrackerPhase.RUNNING;
          this.logger.error('Cycle failed unexpectedly', { error: errorDetails(error) });
        }

        nextStart += this.checkIntervalMs;
        const now = this.clock();
        if (nextStart <= now) {
          this.logger.warn('Cycle overran the check interval', { overrun_ms: now - nextStart });
          nextStart = now;
        }

        const waitMs = deadline === null ? nextStart - now : Math.min(nextStart, deadline) - now;
        if (waitMs > 0) {
          await this.sleep(waitMs, signal);
        }
      }

      const finalSaveSucceeded = await this.finalSave();
      return this.summarize(stopReason, startedAt, finalSaveSucceeded);
    } finally {
      this.tracker.phase = TrackerPhase.STOPPED;
      this.running = false;
    }
  }

  /**
   * Current snapshot with the next checkpoint sequence number.
   */
  snapshot(): SessionSnapshot {
    return {
      ticker: this.ticker,
      prices: this.history.export(),
      lastAlertTime: this.alerts.lastAlertTime,
      checkpointSequenceNumber: this.tracker.checkpointSequence + 1,
    };
  }

  private async cycle(signal?: AbortSignal): Promise<CycleResult> {
    this.tracker.cycles++;

    this.tracker.phase = TrackerPhase.FETCHING;
    const outcome = await this.fetcher.fetch(this.ticker, signal);
    if (!outcome.ok) {
      this.tracker.phase = TrackerPhase.RUNNING;
      if (outcome.error.aborted) {
        this.logger.info('Fetch interrupted by stop signal', { attempts: outcome.error.attempts });
        return { status: 'fetch_interrupted', error: outcome.error };
      }
      this.tracker.failedFetches++;
      this.logger.warn('No price this cycle, skipping', { error: outcome.error.toJSON() });
      return { status: 'fetch_failed', error: outcome.error };
    }

    this.tracker.phase = TrackerPhase.EVALUATING;
    const point: PricePoint = { timestamp: this.clock(), price: outcome.quote.price };
    try {
      this.history.record(point);
    } catch (error) {
      this.tracker.phase = TrackerPhase.RUNNING;
      if (isOutOfOrderError(error)) {
        this.logger.error('Price point rejected, skipping', { error: error.toJSON() });
        return { status: 'out_of_order', error };
      }
      throw error;
    }

    this.tracker.successfulChecks++;
    const sma = this.history.sma(this.smaPeriod);
    const drop = this.history.windowedDrop(this.alertWindowMinutes, point.timestamp);
    this.tracker.lastPrice = point.price;
    this.tracker.lastSma = sma;

    this.logger.info(
      `${this.ticker} Price: ${usd(point.price)} | SMA: ${sma === null ? '--' : usd(sma)} | Records: ${this.history.size}`,
      {
        price: point.price,
        sma,
        pct_change: drop?.pctChange ?? null,
        quote_time: new Date(outcome.quote.timestamp).toISOString(),
        attempts: outcome.attempts,
      }
    );

    const decision = this.alerts.evaluate(drop, point.timestamp);
    if (decision.reason === 'throttled') {
      this.logger.info('Drop alert throttled', { cooldown_remaining_ms: decision.cooldownRemainingMs });
    }

    if (decision.fire && drop !== null) {
      this.tracker.phase = TrackerPhase.ALERTING;
      await this.dispatch(drop, point.timestamp);
    }

    let checkpointed = false;
    if (this.sessionStore !== null && this.tracker.successfulChecks % this.checkpointInterval === 0) {
      this.tracker.phase = TrackerPhase.CHECKPOINTING;
      checkpointed = await this.checkpoint(this.sessionStore);
    }

    this.tracker.phase = TrackerPhase.RUNNING;
    return { status: 'recorded', point, sma, drop, decision, checkpointed };
  }

  private async dispatch(drop: WindowedDrop, firedAt: number): Promise<void> {
    this.tracker.alertsFired++;

    const message = formatAlertMessage({
      ticker: this.ticker,
      baseline: drop.baseline,
      current: drop.current,
      pctChange: drop.pctChange,
      windowMinutes: drop.windowMinutes,
      thresholdPct: this.alerts.thresholdPct,
      firedAt,
    });
    this.logger.warn(message, { pct_change: drop.pctChange, baseline: drop.baseline, current: drop.current });

    if (this.audioCue !== null) {
      try {
        await this.audioCue.play();
      } catch (error) {
        this.logger.warn('Audio cue failed', { error: errorDetails(error) });
      }
    }

    if (this.notifier !== null) {
      try {
        await this.notifier.send(message);
        this.logger.info('Alert delivered', { channel: this.notifier.channel });
      } catch (error) {
        this.tracker.notificationFailures++;
        this.logger.error('Alert delivery failed', { channel: this.notifier.channel, error: errorDetails(error) });
      }
    }
  }

  private async checkpoint(store: SessionStore): Promise<boolean> {
    const snapshot = this.snapshot();

    try {
      await store.save(snapshot);
    } catch (error) {
      this.logger.error('Checkpoint failed, retrying at the next boundary', { error: errorDetails(error) });
      return false;
    }

    this.tracker.checkpointSequence = snapshot.checkpointSequenceNumber;
    this.logger.info('Checkpoint saved', {
      sequence: snapshot.checkpointSequenceNumber,
      points: snapshot.prices.length,
      file: store.filePath,
    });
    return true;
  }

  private async finalSave(): Promise<boolean | null> {
    if (this.sessionStore === null) {
      return null;
    }
    this.tracker.phase = TrackerPhase.CHECKPOINTING;
    return this.checkpoint(this.sessionStore);
  }

  private summarize(stopReason: StopReason, startedAt: number, finalSaveSucceeded: boolean | null): TrackerSummary {
    const summary: TrackerSummary = {
      ticker: this.ticker,
      stopReason,
      startedAt,
      stoppedAt: this.clock(),
      cycles: this.tracker.cycles,
      successfulChecks: this.tracker.successfulChecks,
      failedFetches: this.tracker.failedFetches,
      alertsFired: this.tracker.alertsFired,
      notificationFailures: this.tracker.notificationFailures,
      pointsHeld: this.history.size,
      priceRange: this.history.priceRange(),
      checkpointSequence: this.tracker.checkpointSequence,
      finalSaveSucceeded,
    };

    this.logger.info('Tracking summary', { ...summary });
    return summary;
  }
}
