/**
 * @pricelens/app
 *
 * Configuration, dashboard views and the pricelens CLI.
 *
 * @packageDocumentation
 */

export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';
export * from './dashboard/index.js';
export {
  DashboardFormatter,
  FIELD_LABELS,
  formatMoney,
  formatVolume,
  formatMetricValue,
  formatPercent,
  formatPeriodDate,
} from './formatters/dashboard-formatter.js';
export type { OutputFormat, DashboardFormatterOptions } from './formatters/dashboard-formatter.js';
export { runSummary, exitCodeFor, EXIT_CODES, summaryOptionsSchema } from './commands/summary.command.js';
export type { SummaryOptions, SummaryDeps, ExitCode } from './commands/summary.command.js';
export { createProgram } from './program.js';
export type { ProgramIO } from './program.js';
