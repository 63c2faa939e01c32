/**
 * @fileoverview Public API exports for @price-sentinel/logger
 */

export { createLogger } from './createLogger.js';

export { attachGlobalHandlers, gracefulExit } from './errorHandler.js';

export { withCycleContext } from './cycle-context.js';

export { startTimer } from './perf-timer.js';

export type { Logger, LoggerConfig, LogLevel } from './types.js';
export type { FatalEvent, GlobalHandlerOptions, GlobalHandlers } from './errorHandler.js';
export type { PerfTimer } from './perf-timer.js';
