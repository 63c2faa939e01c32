/**
 * @fileoverview Public API for @price-sentinel/alert-engine.
 */

export { AlertEngine, DEFAULT_THRESHOLD_PCT, DEFAULT_COOLDOWN_MS } from './alert-engine.js';
export { formatAlertMessage } from './message.js';
export { AlertState } from './types.js';
export type { AlertDecision, AlertReason, AlertEngineOptions, AlertSnapshot, DropSignal } from './types.js';
export type { AlertMessageInput } from './message.js';
