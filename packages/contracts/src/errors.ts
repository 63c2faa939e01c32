/**
 * @fileoverview Error taxonomy for the price tracker.
 *
 * Every error carries a machine-readable code, a structured data payload and
 * an ISO timestamp, so it can be logged as-is and matched on by callers.
 *
 * @module @price-sentinel/contracts/errors
 */

/**
 * Base error class for all tracker errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new SentinelError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class SentinelError extends Error {
  /**
   * Machine-readable error code (e.g., 'FETCH_EXHAUSTED').
   */
  readonly code: string;

  /**
   * Structured error data for debugging and log correlation.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'SentinelError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Thrown by a quote source when it cannot produce a usable price
 * (empty series, malformed payload, non-positive close).
 */
export class QuoteSourceError extends SentinelError {
  constructor(
    message: string,
    data: {
      symbol: string;
      provider: string;
      [key: string]: unknown;
    }
  ) {
    super('QUOTE_UNAVAILABLE', message, data);
    this.name = 'QuoteSourceError';
  }
}

/**
 * Every fetch attempt failed, or a stop signal cut the retry sequence short.
 *
 * Returned (not thrown) by the retrying fetcher; the loop skips the cycle.
 *
 * @example
 * ```typescript
 * const outcome = await fetcher.fetch('BTC-USD');
 * if (!outcome.ok) {
 *   logger.warn('Skipping cycle', { error: outcome.error.toJSON() });
 * }
 * ```
 */
export class FetchError extends SentinelError {
  /** Number of attempts actually issued */
  readonly attempts: number;

  /** Failure raised by the last attempt */
  readonly lastCause: unknown;

  /** True when a stop signal interrupted a backoff wait */
  readonly aborted: boolean;

  constructor(
    message: string,
    data: {
      symbol: string;
      attempts: number;
      lastCause: unknown;
      aborted?: boolean;
    }
  ) {
    super('FETCH_EXHAUSTED', message, {
      symbol: data.symbol,
      attempts: data.attempts,
      lastCause: describeCause(data.lastCause),
      aborted: data.aborted ?? false,
    });
    this.name = 'FetchError';
    this.attempts = data.attempts;
    this.lastCause = data.lastCause;
    this.aborted = data.aborted ?? false;
  }
}

/**
 * A price point did not advance the history's timestamp.
 *
 * @invariant data.timestamp <= data.lastTimestamp
 */
export class OutOfOrderError extends SentinelError {
  constructor(
    message: string,
    data: {
      timestamp: number;
      lastTimestamp: number;
    }
  ) {
    super('OUT_OF_ORDER', message, data);
    this.name = 'OutOfOrderError';
  }
}

/**
 * Session save or load failed.
 */
export class PersistenceError extends SentinelError {
  readonly operation: 'load' | 'save';

  constructor(
    message: string,
    data: {
      operation: 'load' | 'save';
      filePath: string;
      cause?: unknown;
      [key: string]: unknown;
    }
  ) {
    super('PERSISTENCE_FAILED', message, {
      ...data,
      cause: data.cause === undefined ? undefined : describeCause(data.cause),
    });
    this.name = 'PersistenceError';
    this.operation = data.operation;
  }
}

/**
 * Alert delivery failed. Logged by the loop; the alert still counts as sent.
 */
export class NotificationError extends SentinelError {
  constructor(
    message: string,
    data: {
      channel: string;
      [key: string]: unknown;
    }
  ) {
    super('NOTIFICATION_FAILED', message, data);
    this.name = 'NotificationError';
  }
}

/**
 * Configuration failed validation. Fatal at startup.
 */
export class ConfigError extends SentinelError {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super('CONFIG_INVALID', message, { issues });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return String(cause);
}

export function isSentinelError(error: unknown): error is SentinelError {
  return error instanceof SentinelError;
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export function isOutOfOrderError(error: unknown): error is OutOfOrderError {
  return error instanceof OutOfOrderError;
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

export function isNotificationError(error: unknown): error is NotificationError {
  return error instanceof NotificationError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
