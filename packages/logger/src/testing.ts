/**
 * @fileoverview In-process log capture for tests.
 *
 * @module @price-sentinel/logger/testing
 */

import { Writable } from 'node:stream';
import { createLogger } from './createLogger.js';
import type { Logger, LogLevel } from './types.js';

/**
 * Writable that parses every JSON line a stream transport writes.
 */
export class CaptureStream extends Writable {
  readonly entries: Array<Record<string, unknown>> = [];

  override _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const text = typeof chunk === 'string' ? chunk : Buffer.isBuffer(chunk) ? chunk.toString('utf-8') : '';
    for (const line of text.split('\n')) {
      if (line.trim() === '') {
        continue;
      }
      const entry: unknown = JSON.parse(line);
      if (typeof entry === 'object' && entry !== null && !Array.isArray(entry)) {
        this.entries.push({ ...entry });
      }
    }
    callback();
  }

  /** Messages logged at `level`, in order */
  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry['level'] === level)
      .map((entry) => String(entry['message']));
  }
}

/**
 * Logger writing JSON only to a fresh CaptureStream.
 */
export function createCaptureLogger(level: LogLevel = 'debug'): { logger: Logger; capture: CaptureStream } {
  const capture = new CaptureStream();
  const logger = createLogger({ level, console: false, stream: capture });
  return { logger, capture };
}

/**
 * Lets pending transport writes reach the stream.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}
