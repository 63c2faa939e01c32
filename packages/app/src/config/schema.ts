/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  tracker: z
    .object({
      ticker: z.string().trim().min(1).default('BTC-USD'),
      checkIntervalSeconds: z.number().positive().default(60),
      smaPeriod: z.number().int().positive().default(10),
      checkpointInterval: z.number().int().positive().default(10),
      durationSeconds: z
        .number()
        .positive()
        .nullish()
        .transform((value) => value ?? undefined),
    })
    .default({}),

  alerts: z
    .object({
      priceDropThreshold: z.number().positive().default(2.0),
      alertWindowMinutes: z.number().int().positive().default(60),
      cooldownSeconds: z.number().nonnegative().default(300),
      useSystemBeep: z.boolean().default(true),
    })
    .default({}),

  provider: z
    .object({
      maxRetries: z.number().int().nonnegative().default(3),
      baseDelayMs: z.number().nonnegative().default(1000),
      maxDelayMs: z.number().positive().default(16_000),
      timeoutMs: z.number().positive().default(10_000),
    })
    .default({}),

  telegram: z
    .object({
      botToken: z
        .string()
        .min(1)
        .nullish()
        .transform((value) => value ?? undefined),
      // Chat ids are often numeric in config files and parse as numbers from env
      chatId: z
        .union([z.string().min(1), z.number().int()])
        .nullish()
        .transform((value) => (value === null || value === undefined ? undefined : String(value))),
    })
    .default({}),

  session: z
    .object({
      dir: z.string().min(1).default('.'),
      exportOnExit: z.boolean().default(true),
      exportDir: z.string().min(1).default('.'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).nullable().default('price_tracker.log'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Config file keys (snake_case) to config paths
 */
export const fileMapping: Record<string, string> = {
  ticker: 'tracker.ticker',
  check_interval: 'tracker.checkIntervalSeconds',
  sma_period: 'tracker.smaPeriod',
  checkpoint_interval: 'tracker.checkpointInterval',
  duration_seconds: 'tracker.durationSeconds',
  price_drop_threshold: 'alerts.priceDropThreshold',
  alert_window_minutes: 'alerts.alertWindowMinutes',
  cooldown_seconds: 'alerts.cooldownSeconds',
  use_system_beep: 'alerts.useSystemBeep',
  max_retries: 'provider.maxRetries',
  telegram_bot_token: 'telegram.botToken',
  telegram_chat_id: 'telegram.chatId',
  session_dir: 'session.dir',
  export_on_exit: 'session.exportOnExit',
  export_dir: 'session.exportDir',
  log_level: 'logging.level',
  log_format: 'logging.format',
  log_file: 'logging.filePath',
};

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  TRACKER_TICKER: 'tracker.ticker',
  TRACKER_CHECK_INTERVAL: 'tracker.checkIntervalSeconds',
  TRACKER_THRESHOLD: 'alerts.priceDropThreshold',
  TRACKER_SMA_PERIOD: 'tracker.smaPeriod',
  TRACKER_ALERT_WINDOW: 'alerts.alertWindowMinutes',
  TRACKER_MAX_RETRIES: 'provider.maxRetries',
  TRACKER_SESSION_DIR: 'session.dir',
  TELEGRAM_BOT_TOKEN: 'telegram.botToken',
  TELEGRAM_CHAT_ID: 'telegram.chatId',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
};
