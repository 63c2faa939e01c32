/**
 * @fileoverview Public API for @price-sentinel/tracker.
 */

export { RetryingFetcher } from './retrying-fetcher.js';
export { TrackerLoop } from './tracker-loop.js';
export { abortableSleep } from './sleep.js';
export { TrackerPhase } from './types.js';

export type { RetryingFetcherOptions, FetchOutcome, FetchStats } from './retrying-fetcher.js';
export type { Sleep } from './sleep.js';
export type {
  TrackerState,
  TrackerOptions,
  TrackerDependencies,
  TrackerSummary,
  CycleResult,
  StopReason,
} from './types.js';
