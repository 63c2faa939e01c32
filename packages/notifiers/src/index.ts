/**
 * @fileoverview Public API for @price-sentinel/notifiers.
 */

export { TelegramNotifier } from './telegram.js';
export { TerminalBell } from './terminal-bell.js';
export type { TelegramNotifierOptions } from './telegram.js';
export type { TerminalBellOptions } from './terminal-bell.js';
