/**
 * Result of a windowed change query.
 *
 * @invariant samples >= 2
 * @invariant pctChange === (current - baseline) / baseline * 100
 */
export interface WindowedDrop {
  /** Price of the earliest point inside the window */
  baseline: number;

  /** Timestamp of the baseline point (Unix ms) */
  baselineTimestamp: number;

  /** Price of the latest point */
  current: number;

  /** Percentage change from baseline to current; negative for a drop */
  pctChange: number;

  /** Number of points inside the window */
  samples: number;

  windowMinutes: number;
}

export interface PriceRange {
  min: number;
  max: number;
}

/**
 * Inputs that decide how many points the history must hold.
 */
export interface HistoryCapacityParams {
  smaPeriod: number;
  alertWindowMinutes: number;
  checkIntervalSeconds: number;
}
