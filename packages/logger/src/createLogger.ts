/**
 * @fileoverview Logger factory for the price tracker.
 * Creates configured Winston logger instances with structured logging,
 * secret redaction and flexible transport options.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - Secret redaction for token/key/password fields
 * - Pretty single-line output in development, JSON in production
 * - Optional file and stream transports
 * - Child logger support for component context
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', filePath: './price_tracker.log' });
 * const trackerLogger = logger.child({ component: 'tracker', symbol: 'BTC-USD' });
 * trackerLogger.info('Price recorded', { price: 42150.5, sma: 42010.2 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  // Redact first, then standard fields; each transport applies its own output format
  const baseFormat = format.combine(redactPII(), standardFields);
  const consoleFormat = json ? format.json() : prettyPrint;

  // Files and streams are always JSON so they stay machine-readable
  const fileFormat = format.json();

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: consoleFormat,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: fileFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(
      new winston.transports.Stream({
        stream,
        level,
        format: fileFormat,
      })
    );
  }

  return winston.createLogger({
    level,
    format: baseFormat,
    transports,
    // Uncaught errors are handled in errorHandler.ts
    exitOnError: false,
  });
}
