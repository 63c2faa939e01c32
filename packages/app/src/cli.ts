#!/usr/bin/env tsx

/**
 * CLI entry point for the price-sentinel command
 */

// Load environment variables from .env file
import 'dotenv/config';

import { Command, InvalidArgumentError } from 'commander';
import { isConfigError } from '@price-sentinel/contracts';
import { attachGlobalHandlers, createLogger, gracefulExit, type Logger } from '@price-sentinel/logger';
import { DEFAULT_CONFIG_FILE, loadConfig, type Config, type ConfigOverrides } from './config/index.js';
import { ExportCommand } from './commands/export.command.js';
import { RunCommand } from './commands/run.command.js';
import { StatusCommand } from './commands/status.command.js';

interface SharedOptions {
  config: string;
  ticker?: string;
}

interface RunOptions extends SharedOptions {
  interval?: number;
  threshold?: number;
  duration?: number;
  beep: boolean;
}

interface ExportOptions extends SharedOptions {
  output?: string;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * Load configuration and create the root logger, or exit on invalid config.
 * Global handlers are attached by each command.
 */
function bootstrap(configFile: string, overrides: ConfigOverrides): { config: Config; logger: Logger } {
  let loaded: ReturnType<typeof loadConfig>;
  try {
    loaded = loadConfig({ configFile, overrides });
  } catch (error) {
    if (isConfigError(error)) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const { config, notices } = loaded;
  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath ?? undefined,
  });
  for (const notice of notices) {
    logger.log(notice.level, notice.message, notice.data);
  }

  return { config, logger };
}

const program = new Command();

program
  .name('price-sentinel')
  .description('Track one instrument, alert on price drops, resume after restarts')
  .version('0.1.0');

program
  .command('run', { isDefault: true })
  .description('Track the configured ticker until interrupted')
  .option('-c, --config <path>', 'Path to the JSON config file', DEFAULT_CONFIG_FILE)
  .option('-t, --ticker <symbol>', 'Instrument to track (e.g. BTC-USD, AAPL)')
  .option('-i, --interval <seconds>', 'Seconds between price checks', parsePositiveNumber)
  .option('--threshold <percent>', 'Drop percentage that triggers an alert', parsePositiveNumber)
  .option('-d, --duration <seconds>', 'Stop after this many seconds', parsePositiveNumber)
  .option('--no-beep', 'Disable the terminal bell on alerts')
  .action(async (options: RunOptions) => {
    const { config, logger } = bootstrap(options.config, {
      ticker: options.ticker,
      checkIntervalSeconds: options.interval,
      priceDropThreshold: options.threshold,
      durationSeconds: options.duration,
      useSystemBeep: options.beep ? undefined : false,
    });

    // Fatal errors stop the loop like a signal
    const controller = new AbortController();
    const handlers = attachGlobalHandlers(logger, { onFatal: () => controller.abort() });
    const stop = (signal: NodeJS.Signals) => {
      logger.info('Shutdown requested', { signal });
      controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    const result = await new RunCommand({ config, logger }).execute(controller.signal);
    gracefulExit(logger, result.success && handlers.fatalEvent === null ? 0 : 1);
  });

program
  .command('export')
  .description('Write the saved session history to CSV')
  .option('-c, --config <path>', 'Path to the JSON config file', DEFAULT_CONFIG_FILE)
  .option('-t, --ticker <symbol>', 'Instrument whose session to export')
  .option('-o, --output <file>', 'CSV file to write (default: <TICKER>_price_history_<timestamp>.csv)')
  .action(async (options: ExportOptions) => {
    const { config, logger } = bootstrap(options.config, { ticker: options.ticker });
    attachGlobalHandlers(logger);

    const result = await new ExportCommand({ config, logger }).execute(options.output);
    if (result.output.filePath !== null) {
      console.log(result.output.filePath);
    }
    gracefulExit(logger, result.success ? 0 : 1);
  });

program
  .command('status')
  .description('Print a JSON summary of the saved session')
  .option('-c, --config <path>', 'Path to the JSON config file', DEFAULT_CONFIG_FILE)
  .option('-t, --ticker <symbol>', 'Instrument whose session to inspect')
  .action(async (options: SharedOptions) => {
    const { config, logger } = bootstrap(options.config, { ticker: options.ticker });
    attachGlobalHandlers(logger);

    const result = await new StatusCommand({ config, logger }).execute();
    console.log(JSON.stringify(result.output, null, 2));
    gracefulExit(logger, result.success ? 0 : 1);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('price-sentinel failed:', error);
  process.exit(1);
});
