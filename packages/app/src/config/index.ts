/**
 * Configuration loading and management
 */

import { existsSync, readFileSync } from 'node:fs';
import { ConfigError } from '@price-sentinel/contracts';
import { configSchema, envMapping, fileMapping, type Config } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'price_tracker_config.json';

type RawConfig = { [key: string]: unknown };

/**
 * Command-line overrides; the highest-precedence source
 */
export interface ConfigOverrides {
  ticker?: string;
  checkIntervalSeconds?: number;
  priceDropThreshold?: number;
  durationSeconds?: number;
  useSystemBeep?: boolean;
}

const overrideMapping: Array<[keyof ConfigOverrides, string]> = [
  ['ticker', 'tracker.ticker'],
  ['checkIntervalSeconds', 'tracker.checkIntervalSeconds'],
  ['priceDropThreshold', 'alerts.priceDropThreshold'],
  ['durationSeconds', 'tracker.durationSeconds'],
  ['useSystemBeep', 'alerts.useSystemBeep'],
];

export interface LoadConfigOptions {
  /** @default 'price_tracker_config.json' */
  configFile?: string;

  /** @default process.env */
  env?: Record<string, string | undefined>;

  overrides?: ConfigOverrides;
}

/**
 * Something worth logging about where configuration came from. Loading
 * happens before the logger exists, so these are handed back to the caller.
 */
export interface ConfigNotice {
  level: 'info' | 'warn';
  message: string;
  data?: Record<string, unknown>;
}

export interface LoadedConfig {
  config: Config;
  notices: ConfigNotice[];
}

/**
 * Load configuration from defaults, the config file, the environment and
 * command-line overrides, in increasing precedence.
 *
 * @throws {ConfigError} If the merged configuration fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const configFile = options.configFile ?? DEFAULT_CONFIG_FILE;
  const env = options.env ?? process.env;
  const rawConfig: RawConfig = {};
  const notices: ConfigNotice[] = [];

  // Config file
  if (existsSync(configFile)) {
    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configFile, 'utf-8'));
      if (!isRecord(fileConfig)) {
        throw new Error('top-level value must be an object');
      }

      for (const [key, value] of Object.entries(fileConfig)) {
        const configPath = fileMapping[key];
        if (configPath === undefined) {
          notices.push({ level: 'warn', message: 'Ignoring unknown config file key', data: { key, configFile } });
        } else {
          setNestedProperty(rawConfig, configPath, value);
        }
      }
      notices.push({ level: 'info', message: 'Loaded config file', data: { configFile } });
    } catch (error) {
      notices.push({
        level: 'warn',
        message: 'Could not load config file, skipping it',
        data: { configFile, error: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  // Environment variables
  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  // Command-line flags
  const overrides = options.overrides ?? {};
  for (const [key, configPath] of overrideMapping) {
    const value = overrides[key];
    if (value !== undefined) {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  // Parse and validate
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, issues);
  }

  return { config: result.data, notices };
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = target;

  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

/**
 * Get configuration summary for logging; never includes secrets
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    ticker: config.tracker.ticker,
    checkIntervalSeconds: config.tracker.checkIntervalSeconds,
    smaPeriod: config.tracker.smaPeriod,
    durationSeconds: config.tracker.durationSeconds ?? null,
    alerts: {
      threshold: `${config.alerts.priceDropThreshold}% drop in ${config.alerts.alertWindowMinutes} minutes`,
      systemBeep: config.alerts.useSystemBeep ? 'ON' : 'OFF',
      telegram: isTelegramEnabled(config) ? 'ON' : 'OFF',
    },
    maxRetries: config.provider.maxRetries,
    sessionDir: config.session.dir,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath,
    },
  };
}

export function isTelegramEnabled(config: Config): boolean {
  return config.telegram.botToken !== undefined && config.telegram.chatId !== undefined;
}

// Re-export types
export { configSchema } from './schema.js';
export type { Config } from './schema.js';
