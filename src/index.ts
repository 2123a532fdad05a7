/**
 * Library entry point for prefix-organizer
 */

export * from './types.js';
export {
  DEFAULT_SEPARATOR,
  validateSeparator,
  extractPrefix,
  buildForwardPlan,
  buildReversePlan,
  groupPlanBySubdir,
} from './planner.js';
export { assertTargetDirectory, listDirectory, listReverseSource } from './directory-listing.js';
export { applyPlan, applyReverse, describeEntry } from './executor.js';
export type { ExecutionOptions } from './executor.js';
export {
  ConfigManager,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  resolveRunSettings,
} from './config.js';
export type { AppConfig, OrganizerSettings, RunSettings, SettingOverrides } from './config.js';
export { LocaleManager, detectSystemLanguage, formatMessage, REQUIRED_LOCALE_KEYS } from './locale.js';
export type { LocaleKey, LocaleParams } from './locale.js';
export {
  formatPlanPreview,
  formatReversePreview,
  formatExecutionReport,
  formatReportEntry,
  exitCodeForReport,
} from './report-format.js';
export type { Translator, PreviewOptions } from './report-format.js';
export { Logger, logger, AppError, ConfigurationError, handleError } from './logger.js';
export type { LogLevel, LogEntry, LoggerOptions } from './logger.js';
export { confirmOnTerminal, parseArgs, runCli } from './organize-cli.js';
export type { CliIO, CliOptions } from './organize-cli.js';
