/**
 * Export command implementation
 */

import type { Logger } from '@price-sentinel/logger';
import type { Config } from '../config/index.js';
import { writeHistoryCsv } from '../export/csv.js';
import { openSessionStore } from './session.js';
import type { CommandResult } from './types.js';

export interface ExportCommandConfig {
  config: Config;
  logger: Logger;
  now?: () => Date;
}

export interface ExportOutput {
  /** Null when there was nothing to export */
  filePath: string | null;
  points: number;
}

/**
 * export - writes the saved session's history to CSV
 */
export class ExportCommand {
  name = 'export';
  description = 'Export the saved session history to CSV';

  private config: Config;
  private logger: Logger;
  private now: () => Date;

  constructor(options: ExportCommandConfig) {
    this.config = options.config;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async execute(outputPath?: string): Promise<CommandResult<ExportOutput>> {
    const snapshot = await openSessionStore(this.config, this.logger).load();

    if (snapshot === null || snapshot.prices.length === 0) {
      this.logger.warn('No data to export', { ticker: this.config.tracker.ticker });
      return { success: false, output: { filePath: null, points: 0 } };
    }

    const filePath = await writeHistoryCsv(snapshot.prices, {
      ticker: this.config.tracker.ticker,
      smaPeriod: this.config.tracker.smaPeriod,
      outputDir: this.config.session.exportDir,
      filePath: outputPath,
      now: this.now(),
    });

    this.logger.info('Data exported', { filePath, points: snapshot.prices.length });
    return { success: true, output: { filePath, points: snapshot.prices.length } };
  }
}
