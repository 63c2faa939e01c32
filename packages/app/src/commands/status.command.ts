/**
 * Status command implementation
 */

import type { Logger } from '@price-sentinel/logger';
import type { Config } from '../config/index.js';
import { openSessionStore } from './session.js';
import type { CommandResult } from './types.js';

export interface SessionStatus {
  ticker: string;
  file: string;
  points: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  latestPrice: number | null;
  priceRange: { min: number; max: number } | null;
  lastAlertTime: string | null;
  checkpointSequenceNumber: number;
}

/**
 * status - summarizes the saved session without starting the tracker
 */
export class StatusCommand {
  name = 'status';
  description = 'Show a summary of the saved session';

  private config: Config;
  private logger: Logger;

  constructor(options: { config: Config; logger: Logger }) {
    this.config = options.config;
    this.logger = options.logger;
  }

  async execute(): Promise<CommandResult<SessionStatus | null>> {
    const store = openSessionStore(this.config, this.logger);
    const snapshot = await store.load();

    if (snapshot === null) {
      return { success: false, output: null };
    }

    const first = snapshot.prices[0];
    const last = snapshot.prices[snapshot.prices.length - 1];
    const prices = snapshot.prices.map((point) => point.price);

    return {
      success: true,
      output: {
        ticker: snapshot.ticker,
        file: store.filePath,
        points: snapshot.prices.length,
        firstTimestamp: first === undefined ? null : new Date(first.timestamp).toISOString(),
        lastTimestamp: last === undefined ? null : new Date(last.timestamp).toISOString(),
        latestPrice: last?.price ?? null,
        priceRange: prices.length === 0 ? null : { min: Math.min(...prices), max: Math.max(...prices) },
        lastAlertTime: snapshot.lastAlertTime === null ? null : new Date(snapshot.lastAlertTime).toISOString(),
        checkpointSequenceNumber: snapshot.checkpointSequenceNumber,
      },
    };
  }
}
