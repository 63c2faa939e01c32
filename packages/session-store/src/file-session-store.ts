/**
 * @fileoverview File-backed session store.
 *
 * @module @price-sentinel/session-store
 */

import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';
import { PersistenceError, type SessionSnapshot } from '@price-sentinel/contracts';
import type { Logger } from '@price-sentinel/logger';
import { fromSessionFile, sessionFileSchema, toSessionFile } from './schema.js';
import type { SessionStore } from './types.js';

/**
 * Default session file for a ticker: `<sessionDir>/<TICKER>_session.json`.
 *
 * Characters that are unsafe in file names are replaced with `_`.
 */
export function sessionFilePath(sessionDir: string, ticker: string): string {
  const safeTicker = ticker.replace(/[^A-Za-z0-9._=^-]/g, '_');
  return join(sessionDir, `${safeTicker}_session.json`);
}

export interface FileSessionStoreOptions {
  /** Instrument this store belongs to; snapshots for other tickers are discarded */
  ticker: string;

  /** @default '.' */
  sessionDir?: string;

  /** Overrides the path derived from `sessionDir` and `ticker` */
  filePath?: string;
}

/**
 * Stores one snapshot per instrument as pretty-printed JSON.
 *
 * `save` writes a temp file beside the target and renames it over the
 * previous snapshot, so an interrupted write leaves the old file intact.
 * `load` never throws: missing, unreadable and invalid files all mean
 * "start fresh".
 */
export class FileSessionStore implements SessionStore {
  readonly filePath: string;
  private readonly ticker: string;
  private readonly logger: Logger;
  private writes = 0;

  constructor(logger: Logger, options: FileSessionStoreOptions) {
    this.logger = logger;
    this.ticker = options.ticker;
    this.filePath = options.filePath ?? sessionFilePath(options.sessionDir ?? '.', options.ticker);
  }

  async save(snapshot: SessionSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${++this.writes}.tmp`;
    const body = JSON.stringify(toSessionFile(snapshot), null, 2);

    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, body, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug('Could not remove temp session file', { tempPath, error: String(cleanupError) });
      });
      throw new PersistenceError(`Failed to save session to ${this.filePath}`, {
        operation: 'save',
        filePath: this.filePath,
        cause: error,
      });
    }

    this.logger.debug('Session saved', {
      filePath: this.filePath,
      points: snapshot.prices.length,
      sequence: snapshot.checkpointSequenceNumber,
    });
  }

  async load(): Promise<SessionSnapshot | null> {
    let raw: string;

    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info('No previous session found', { filePath: this.filePath });
      } else {
        this.warnDiscarded('Could not read session file', { error: String(error) });
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.warnDiscarded('Session file is not valid JSON', { error: String(error) });
      return null;
    }

    const parsed = sessionFileSchema.safeParse(json);
    if (!parsed.success) {
      this.warnDiscarded('Session file failed validation', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }

    if (parsed.data.ticker !== this.ticker) {
      this.warnDiscarded('Session belongs to a different ticker', {
        expected: this.ticker,
        found: parsed.data.ticker,
      });
      return null;
    }

    const snapshot = fromSessionFile(parsed.data);
    this.logger.info('Loaded records from previous session', {
      filePath: this.filePath,
      points: snapshot.prices.length,
      sequence: snapshot.checkpointSequenceNumber,
    });
    return snapshot;
  }

  private warnDiscarded(message: string, data: Record<string, unknown>): void {
    const error = new PersistenceError(message, { operation: 'load', filePath: this.filePath, ...data });
    this.logger.warn(`${message}, starting fresh`, { error: error.toJSON() });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
