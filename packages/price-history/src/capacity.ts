import type { HistoryCapacityParams } from './types.js';

/**
 * Headroom over the points strictly needed, so slow cycles and a resumed
 * session's older points don't push needed points out.
 */
const CAPACITY_SLACK_FACTOR = 2;

/**
 * Number of points the history keeps before overwriting the oldest.
 *
 * At the configured cadence the alert window holds at most
 * `ceil(window / interval) + 1` points and the SMA needs `smaPeriod`; the
 * capacity is the larger of the two times the slack factor.
 *
 * @example
 * ```typescript
 * historyCapacity({ smaPeriod: 10, alertWindowMinutes: 60, checkIntervalSeconds: 60 }); // 122
 * ```
 */
export function historyCapacity(params: HistoryCapacityParams): number {
  const { smaPeriod, alertWindowMinutes, checkIntervalSeconds } = params;

  if (!Number.isInteger(smaPeriod) || smaPeriod < 1) {
    throw new RangeError(`smaPeriod must be a positive integer, got ${smaPeriod}`);
  }
  if (!(alertWindowMinutes > 0) || !(checkIntervalSeconds > 0)) {
    throw new RangeError('alertWindowMinutes and checkIntervalSeconds must be positive');
  }

  const windowPoints = Math.ceil((alertWindowMinutes * 60) / checkIntervalSeconds) + 1;
  return CAPACITY_SLACK_FACTOR * Math.max(smaPeriod, windowPoints);
}
