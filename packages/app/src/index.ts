/**
 * @price-sentinel/app
 *
 * Configuration, command implementations and CSV export behind the CLI.
 */

export { loadConfig, getConfigSummary, isTelegramEnabled, configSchema, DEFAULT_CONFIG_FILE } from './config/index.js';
export type { Config, ConfigOverrides, ConfigNotice, LoadConfigOptions, LoadedConfig } from './config/index.js';

export { RunCommand } from './commands/run.command.js';
export { ExportCommand } from './commands/export.command.js';
export { StatusCommand } from './commands/status.command.js';
export type { RunCommandConfig, RunOutput } from './commands/run.command.js';
export type { ExportCommandConfig, ExportOutput } from './commands/export.command.js';
export type { SessionStatus } from './commands/status.command.js';
export type { CommandResult } from './commands/types.js';

export { formatHistoryCsv, exportFileName, writeHistoryCsv } from './export/csv.js';
