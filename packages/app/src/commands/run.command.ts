/**
 * Run command implementation
 */

import { AlertEngine } from '@price-sentinel/alert-engine';
import type { AudioCue, Notifier, QuoteSource } from '@price-sentinel/contracts';
import { startTimer, type Logger } from '@price-sentinel/logger';
import { TelegramNotifier, TerminalBell } from '@price-sentinel/notifiers';
import { PriceHistory, historyCapacity } from '@price-sentinel/price-history';
import { YahooQuoteSource } from '@price-sentinel/provider-yahoo';
import { openSessionStore } from './session.js';
import { RetryingFetcher, TrackerLoop, type Sleep, type TrackerSummary } from '@price-sentinel/tracker';
import { getConfigSummary, type Config } from '../config/index.js';
import { writeHistoryCsv } from '../export/csv.js';
import type { CommandResult } from './types.js';

export interface RunCommandConfig {
  config: Config;
  logger: Logger;

  /** Defaults to Yahoo Finance */
  quoteSource?: QuoteSource;

  /** Defaults to Telegram when configured; null disables */
  notifier?: Notifier | null;

  /** Defaults to the terminal bell when enabled; null disables */
  audioCue?: AudioCue | null;

  clock?: () => number;
  sleep?: Sleep;
}

export interface RunOutput {
  summary: TrackerSummary;

  /** CSV written on exit, if any */
  exportPath: string | null;
}

/**
 * run - tracks the configured ticker until stopped or the duration elapses
 */
export class RunCommand {
  name = 'run';
  description = 'Track the configured ticker and alert on price drops';

  private config: Config;
  private logger: Logger;
  private clock: () => number;
  private history: PriceHistory;
  private loop: TrackerLoop;

  constructor(options: RunCommandConfig) {
    const { config, logger } = options;
    this.config = config;
    this.logger = logger;
    this.clock = options.clock ?? Date.now;

    this.history = new PriceHistory(
      historyCapacity({
        smaPeriod: config.tracker.smaPeriod,
        alertWindowMinutes: config.alerts.alertWindowMinutes,
        checkIntervalSeconds: config.tracker.checkIntervalSeconds,
      })
    );

    const quoteSource = options.quoteSource ?? new YahooQuoteSource({ timeoutMs: config.provider.timeoutMs });
    const fetcher = new RetryingFetcher(quoteSource, logger.child({ component: 'fetcher' }), {
      maxRetries: config.provider.maxRetries,
      baseDelayMs: config.provider.baseDelayMs,
      maxDelayMs: config.provider.maxDelayMs,
      sleep: options.sleep,
    });

    const sessionStore = openSessionStore(config, logger);

    this.loop = new TrackerLoop(
      {
        ticker: config.tracker.ticker,
        smaPeriod: config.tracker.smaPeriod,
        alertWindowMinutes: config.alerts.alertWindowMinutes,
        checkIntervalMs: config.tracker.checkIntervalSeconds * 1000,
        checkpointInterval: config.tracker.checkpointInterval,
        maxDurationMs:
          config.tracker.durationSeconds === undefined ? null : config.tracker.durationSeconds * 1000,
      },
      {
        fetcher,
        history: this.history,
        alerts: new AlertEngine({
          thresholdPct: config.alerts.priceDropThreshold,
          cooldownMs: config.alerts.cooldownSeconds * 1000,
        }),
        logger,
        sessionStore,
        notifier: options.notifier !== undefined ? options.notifier : createNotifier(config),
        audioCue: options.audioCue !== undefined ? options.audioCue : config.alerts.useSystemBeep ? new TerminalBell() : null,
        clock: this.clock,
        sleep: options.sleep,
      }
    );
  }

  async execute(signal: AbortSignal): Promise<CommandResult<RunOutput>> {
    const timer = startTimer();

    this.logger.info(`Starting price tracker for ${this.config.tracker.ticker}`, getConfigSummary(this.config));

    await this.loop.resume();
    const summary = await this.loop.run(signal);

    if (summary.priceRange !== null) {
      this.logger.info(
        `Price range: $${summary.priceRange.min.toFixed(2)} - $${summary.priceRange.max.toFixed(2)}`
      );
    }

    const exportPath = await this.exportOnExit();

    return {
      success: summary.finalSaveSucceeded !== false,
      output: { summary, exportPath },
      duration: timer.stop(),
    };
  }

  private async exportOnExit(): Promise<string | null> {
    if (!this.config.session.exportOnExit || this.history.size === 0) {
      return null;
    }

    try {
      const filePath = await writeHistoryCsv(this.history.export(), {
        ticker: this.config.tracker.ticker,
        smaPeriod: this.config.tracker.smaPeriod,
        outputDir: this.config.session.exportDir,
        now: new Date(this.clock()),
      });
      this.logger.info('Data exported', { filePath, points: this.history.size });
      return filePath;
    } catch (error) {
      this.logger.error('Export on exit failed', { error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }
}

function createNotifier(config: Config): Notifier | null {
  const { botToken, chatId } = config.telegram;
  if (botToken === undefined || chatId === undefined) {
    return null;
  }
  return new TelegramNotifier({ botToken, chatId, timeoutMs: config.provider.timeoutMs });
}
