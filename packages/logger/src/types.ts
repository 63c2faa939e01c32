/**
 * @fileoverview Type definitions for the tracker logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that need attention (exhausted fetches, failed saves)
 * - 'warn': Alerts, retries and recoverable problems
 * - 'info': Per-cycle status and lifecycle events
 * - 'debug': Individual fetch attempts and timings
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './price_tracker.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON
   * - false: Human-readable pretty-print
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, written in addition to console.
   * @example './price_tracker.log'
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Extra writable stream receiving every formatted entry.
   * Used to capture logs in tests or pipe them to another process.
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
