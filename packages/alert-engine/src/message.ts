/**
 * @fileoverview Alert message text, shared by the log line and every notifier.
 */

export interface AlertMessageInput {
  ticker: string;
  baseline: number;
  current: number;
  pctChange: number;
  windowMinutes: number;
  thresholdPct: number;

  /** Time the alert fired, Unix ms */
  firedAt: number;
}

function usd(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Formats the alert text.
 *
 * @example
 * ```typescript
 * formatAlertMessage({
 *   ticker: 'BTC-USD', baseline: 100, current: 95, pctChange: -5,
 *   windowMinutes: 60, thresholdPct: 2, firedAt: Date.parse('2025-03-03T14:09:00Z'),
 * });
 * // 🚨 PRICE DROP ALERT - BTC-USD
 * // Drop detected: -5.00% (threshold: 2%)
 * // Baseline: $100.00
 * // Current: $95.00
 * // Window: Last 60 minutes
 * // Time: 2025-03-03 14:09:00 UTC
 * ```
 */
export function formatAlertMessage(input: AlertMessageInput): string {
  const time = new Date(input.firedAt).toISOString().replace('T', ' ').slice(0, 19);

  return [
    `🚨 PRICE DROP ALERT - ${input.ticker}`,
    `Drop detected: ${input.pctChange.toFixed(2)}% (threshold: ${input.thresholdPct}%)`,
    `Baseline: ${usd(input.baseline)}`,
    `Current: ${usd(input.current)}`,
    `Window: Last ${input.windowMinutes} minutes`,
    `Time: ${time} UTC`,
  ].join('\n');
}
