/**
 * @fileoverview Tracker loop types.
 */

import type { AlertDecision, AlertEngine } from '@price-sentinel/alert-engine';
import type { AudioCue, FetchError, Notifier, OutOfOrderError, PricePoint } from '@price-sentinel/contracts';
import type { Logger } from '@price-sentinel/logger';
import type { PriceHistory, PriceRange, WindowedDrop } from '@price-sentinel/price-history';
import type { SessionStore } from '@price-sentinel/session-store';
import type { RetryingFetcher } from './retrying-fetcher.js';
import type { Sleep } from './sleep.js';

/**
 * Loop phases.
 *
 * RUNNING → FETCHING → EVALUATING → (ALERTING) → (CHECKPOINTING) → RUNNING,
 * and STOPPED once the loop has shut down.
 */
export enum TrackerPhase {
  RUNNING = 'RUNNING',
  FETCHING = 'FETCHING',
  EVALUATING = 'EVALUATING',
  ALERTING = 'ALERTING',
  CHECKPOINTING = 'CHECKPOINTING',
  STOPPED = 'STOPPED',
}

/**
 * Everything the loop mutates besides the history and the alert engine.
 */
export interface TrackerState {
  phase: TrackerPhase;

  /** Cycles started, including skipped ones */
  cycles: number;

  /** Cycles that recorded a price */
  successfulChecks: number;

  failedFetches: number;
  alertsFired: number;
  notificationFailures: number;

  /** Sequence number of the last snapshot written or restored */
  checkpointSequence: number;

  lastPrice: number | null;
  lastSma: number | null;
}

export interface TrackerOptions {
  ticker: string;

  /** @default 10 */
  smaPeriod?: number;

  /** @default 60 */
  alertWindowMinutes?: number;

  /** Cycle start to cycle start. @default 60000 */
  checkIntervalMs?: number;

  /** Successful checks between snapshots. @default 10 */
  checkpointInterval?: number;

  /** Stop after this long; unset runs until aborted */
  maxDurationMs?: number | null;
}

export interface TrackerDependencies {
  fetcher: RetryingFetcher;
  history: PriceHistory;
  alerts: AlertEngine;
  logger: Logger;
  sessionStore?: SessionStore | null;
  notifier?: Notifier | null;
  audioCue?: AudioCue | null;

  /** @default Date.now */
  clock?: () => number;

  sleep?: Sleep;
}

export type CycleResult =
  | { status: 'fetch_failed'; error: FetchError }
  | { status: 'fetch_interrupted'; error: FetchError }
  | { status: 'out_of_order'; error: OutOfOrderError }
  | {
      status: 'recorded';
      point: PricePoint;
      sma: number | null;
      drop: WindowedDrop | null;
      decision: AlertDecision;
      checkpointed: boolean;
    };

export type StopReason = 'signal' | 'duration';

export interface TrackerSummary {
  ticker: string;
  stopReason: StopReason;
  startedAt: number;
  stoppedAt: number;
  cycles: number;
  successfulChecks: number;
  failedFetches: number;
  alertsFired: number;
  notificationFailures: number;
  pointsHeld: number;
  priceRange: PriceRange | null;
  checkpointSequence: number;

  /** Outcome of the shutdown save; null without a session store */
  finalSaveSucceeded: boolean | null;
}
