/**
 * @fileoverview Alert engine types.
 */

/**
 * Alert engine states.
 *
 * ARMED → COOLING_DOWN when an alert fires; COOLING_DOWN → ARMED once the
 * cooldown has elapsed since the last alert.
 */
export enum AlertState {
  ARMED = 'ARMED',
  COOLING_DOWN = 'COOLING_DOWN',
}

/**
 * Why a decision came out the way it did.
 *
 * - 'no_signal': not enough in-window data to measure a change
 * - 'below_threshold': change did not reach the drop threshold
 * - 'throttled': threshold reached while cooling down
 * - 'threshold_breached': alert fired
 */
export type AlertReason = 'no_signal' | 'below_threshold' | 'throttled' | 'threshold_breached';

/**
 * Minimal view of a windowed change the engine needs.
 */
export interface DropSignal {
  pctChange: number;
}

export interface AlertDecision {
  fire: boolean;
  reason: AlertReason;

  /** State after the decision was applied */
  state: AlertState;

  /** Milliseconds until the engine re-arms; 0 when armed */
  cooldownRemainingMs: number;
}

export interface AlertEngineOptions {
  /**
   * Drop, in percent, that fires an alert. A change of `-thresholdPct` or lower qualifies.
   * @default 2.0
   */
  thresholdPct?: number;

  /**
   * Minimum time between two dispatched alerts.
   * @default 300000 (5 minutes)
   */
  cooldownMs?: number;

  /**
   * Time of the last dispatched alert, e.g. from a resumed session.
   * @default null
   */
  lastAlertTime?: number | null;
}

/**
 * Persisted alert state.
 */
export interface AlertSnapshot {
  lastAlertTime: number | null;
}
