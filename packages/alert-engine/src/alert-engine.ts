/**
 * @fileoverview Drop alert state machine.
 */

import {
  AlertState,
  type AlertDecision,
  type AlertEngineOptions,
  type AlertSnapshot,
  type DropSignal,
} from './types.js';

export const DEFAULT_THRESHOLD_PCT = 2.0;
export const DEFAULT_COOLDOWN_MS = 5 * 60 * 1000;

/**
 * Decides whether a windowed drop should fire an alert.
 *
 * The engine owns `lastAlertTime` and is the only writer of it. Firing
 * commits the transition immediately; delivery is the caller's job and a
 * failed delivery does not re-arm the engine, so a flaky notifier cannot
 * turn one drop into a burst of alerts.
 *
 * @example
 * ```typescript
 * const engine = new AlertEngine({ thresholdPct: 2, cooldownMs: 300_000 });
 * const decision = engine.evaluate(history.windowedDrop(60, now), now);
 * if (decision.fire) {
 *   await notifier.send(message);
 * }
 * ```
 */
export class AlertEngine {
  readonly thresholdPct: number;
  readonly cooldownMs: number;
  private lastAlert: number | null;

  constructor(options: AlertEngineOptions = {}) {
    this.thresholdPct = options.thresholdPct ?? DEFAULT_THRESHOLD_PCT;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.lastAlert = options.lastAlertTime ?? null;

    if (!(this.thresholdPct > 0)) {
      throw new RangeError(`thresholdPct must be positive, got ${this.thresholdPct}`);
    }
    if (!(this.cooldownMs >= 0)) {
      throw new RangeError(`cooldownMs must be non-negative, got ${this.cooldownMs}`);
    }
  }

  get lastAlertTime(): number | null {
    return this.lastAlert;
  }

  state(now: number): AlertState {
    return this.cooldownRemaining(now) > 0 ? AlertState.COOLING_DOWN : AlertState.ARMED;
  }

  /**
   * Evaluates one drop signal at `now`.
   *
   * @param drop - Windowed change, or null when there is not enough data
   */
  evaluate(drop: DropSignal | null, now: number): AlertDecision {
    if (drop === null) {
      return this.decision(false, 'no_signal', now);
    }

    if (drop.pctChange > -this.thresholdPct) {
      return this.decision(false, 'below_threshold', now);
    }

    if (this.state(now) === AlertState.COOLING_DOWN) {
      return this.decision(false, 'throttled', now);
    }

    this.lastAlert = now;
    return this.decision(true, 'threshold_breached', now);
  }

  /**
   * Replaces the alert state, e.g. from a resumed session.
   */
  restore(lastAlertTime: number | null): void {
    this.lastAlert = lastAlertTime;
  }

  snapshot(): AlertSnapshot {
    return { lastAlertTime: this.lastAlert };
  }

  private cooldownRemaining(now: number): number {
    if (this.lastAlert === null) {
      return 0;
    }
    return Math.max(0, this.lastAlert + this.cooldownMs - now);
  }

  private decision(fire: boolean, reason: AlertDecision['reason'], now: number): AlertDecision {
    return {
      fire,
      reason,
      state: this.state(now),
      cooldownRemainingMs: this.cooldownRemaining(now),
    };
  }
}
