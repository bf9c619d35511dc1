/**
 * @tallycheck/cli
 *
 * Config loading and the validation runner behind the tallycheck command.
 */

export { main, USAGE } from './main.js';
export type { MainIO } from './main.js';
export { parseArgs } from './args.js';
export type { ParsedArgs } from './args.js';
export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  mergeConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions, SideColumnRefs } from './config.js';
export { resolveSettings } from './settings.js';
export type { RunSettings, OutputFormat } from './settings.js';
export { runValidation, loadGrid, resolveColumns, exitCodeFor } from './run.js';
export type { RunIO, LoadedGrid, ResolvedColumns } from './run.js';
export { Logger, toLoggable } from './logger.js';
export type { LogLevel, LogFormat, LogSink } from './logger.js';
