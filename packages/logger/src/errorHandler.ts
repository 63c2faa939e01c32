/**
 * @fileoverview Process-level handlers for errors nothing else caught.
 *
 * A fatal error asks the owner to stop; the process is forced to exit only
 * when that stop has not finished within the timeout.
 */

import type { Logger } from './types.js';

const FLUSH_TIMEOUT_MS = 3000;
const DEFAULT_STOP_TIMEOUT_MS = 10_000;

export type FatalEvent = 'uncaughtException' | 'unhandledRejection';

export interface GlobalHandlerOptions {
  /**
   * Called once, on the first fatal error. Without it the process exits
   * as soon as the logger has flushed.
   */
  onFatal?: (event: FatalEvent) => void;

  /**
   * How long `onFatal`'s owner gets to wind down before a forced exit.
   * @default 10000
   */
  stopTimeoutMs?: number;

  /** @default process */
  target?: NodeJS.EventEmitter;
}

export interface GlobalHandlers {
  /** First fatal event seen, or null */
  readonly fatalEvent: FatalEvent | null;

  /** Removes the listeners and cancels a pending forced exit */
  detach(): void;
}

let attached: GlobalHandlers | null = null;

function errorDetails(reason: unknown): Record<string, unknown> {
  return reason instanceof Error
    ? { name: reason.name, message: reason.message, stack: reason.stack }
    : { message: String(reason) };
}

/**
 * Logs uncaught exceptions, unhandled rejections and process warnings.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const handlers = attachGlobalHandlers(logger, { onFatal: () => controller.abort() });
 * const summary = await loop.run(controller.signal);
 * gracefulExit(logger, handlers.fatalEvent === null ? 0 : 1);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: GlobalHandlerOptions = {}): GlobalHandlers {
  if (attached !== null) {
    logger.warn('Global error handlers already attached, skipping');
    return attached;
  }

  const target: NodeJS.EventEmitter = options.target ?? process;
  const stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  let fatalEvent: FatalEvent | null = null;
  let forcedExit: NodeJS.Timeout | null = null;

  const fatal = (event: FatalEvent, reason: unknown): void => {
    if (fatalEvent !== null) {
      logger.error('Further fatal error while stopping', { event, error: errorDetails(reason) });
      return;
    }
    fatalEvent = event;

    if (options.onFatal === undefined) {
      logger.error('Fatal error, exiting', { event, error: errorDetails(reason), fatal: true });
      gracefulExit(logger, 1);
      return;
    }

    logger.error('Fatal error, stopping', { event, error: errorDetails(reason), fatal: true, stop_timeout_ms: stopTimeoutMs });
    forcedExit = setTimeout(() => {
      logger.error('Stop timed out, forcing exit', { stop_timeout_ms: stopTimeoutMs });
      gracefulExit(logger, 1);
    }, stopTimeoutMs);
    forcedExit.unref();
    options.onFatal(event);
  };

  const onUncaughtException = (error: unknown): void => fatal('uncaughtException', error);
  const onUnhandledRejection = (reason: unknown): void => fatal('unhandledRejection', reason);
  const onWarning = (warning: Error): void => {
    logger.warn('Process warning emitted', { warning: { name: warning.name, message: warning.message } });
  };

  target.on('uncaughtException', onUncaughtException);
  target.on('unhandledRejection', onUnhandledRejection);
  target.on('warning', onWarning);

  const handlers: GlobalHandlers = {
    get fatalEvent() {
      return fatalEvent;
    },

    detach() {
      target.off('uncaughtException', onUncaughtException);
      target.off('unhandledRejection', onUnhandledRejection);
      target.off('warning', onWarning);
      if (forcedExit !== null) {
        clearTimeout(forcedExit);
      }
      if (attached === handlers) {
        attached = null;
      }
    },
  };

  attached = handlers;
  logger.debug('Global error handlers attached');
  return handlers;
}

/**
 * Ends the logger and exits once it has flushed, or after FLUSH_TIMEOUT_MS.
 */
export function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
