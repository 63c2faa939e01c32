/**
 * @fileoverview Custom Winston formats for the tracker logger.
 * Secret redaction, standard fields, cycle ID injection and pretty output.
 */

import { format } from 'winston';
import { getCycleId } from './cycle-context.js';

/**
 * Field-name patterns whose values never reach a transport.
 * The Telegram bot token is the main secret this process handles.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive fields replaced, recursing into
 * nested objects and arrays.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ chatId: '42', botToken: 'test-token' });
 * // { chatId: '42', botToken: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  // Errors keep their prototype so format.errors() can still read the stack
  if (value instanceof Error) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return copy;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run before any output format.
 *
 * @example
 * ```typescript
 * logger.info('Telegram configured', { chatId: '42', botToken: 'test-token' });
 * // {"level":"info","message":"Telegram configured","chatId":"42","botToken":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Timestamp, error stacks and the current cycle ID.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const cycleId = getCycleId();
    if (cycleId && !info['cycle_id']) {
      info['cycle_id'] = cycleId;
    }
    return info;
  })()
);

/**
 * Human-readable single-line output.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Price recorded component=tracker symbol=BTC-USD cycle=12
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, cycle_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (cycle_id) context.push(`cycle_id=${String(cycle_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (typeof info['stack'] === 'string') {
      return `${baseMsg}\n${info['stack']}`;
    }

    return baseMsg;
  })
);
