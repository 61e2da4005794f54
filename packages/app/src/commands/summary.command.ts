/**
 * `pricelens summary`: load a dataset, build the dashboard and print it.
 */

import { z } from 'zod';
import chalk from 'chalk';
import {
  ConfigError,
  LoadEmptyError,
  isConfigError,
  isLoadEmptyError,
  isLoadError,
  isPriceLensError,
  isRangeEmptyError,
} from '@pricelens/contracts';
import { createChildLogger, startTimer, type Logger } from '@pricelens/logger';
import { SeriesLoader } from '@pricelens/series-core';
import type { Config } from '../config/index.js';
import { buildDashboard } from '../dashboard/index.js';
import { DashboardFormatter } from '../formatters/dashboard-formatter.js';

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  OK: 0,
  NO_DATA: 1,
  INVALID_INPUT: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const integerOption = z.coerce.number().int();

/**
 * Raw commander option values, all optional strings or flags.
 */
export const summaryOptionsSchema = z.object({
  data: z.string().min(1).optional(),
  metric: z.string().optional(),
  period: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  year: integerOption.optional(),
  short: integerOption.optional(),
  long: integerOption.optional(),
  volumeMa: integerOption.optional(),
  json: z.boolean().default(false),
  color: z.boolean().default(true),
});

export type SummaryOptions = z.input<typeof summaryOptionsSchema>;

export interface SummaryDeps {
  config: Config;
  logger: Logger;
  /** Shared loader; one is created from config when omitted. */
  loader?: SeriesLoader;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/**
 * Maps a failure to its exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isLoadEmptyError(error) || isRangeEmptyError(error)) return EXIT_CODES.NO_DATA;
  if (isConfigError(error) || isLoadError(error)) return EXIT_CODES.INVALID_INPUT;
  return EXIT_CODES.NO_DATA;
}

/**
 * Runs the summary command.
 *
 * PriceLens errors are reported on stderr and turned into an exit code; any
 * other error propagates.
 */
export function runSummary(rawOptions: SummaryOptions, deps: SummaryDeps): ExitCode {
  const { config, stdout, stderr } = deps;
  const logger = createChildLogger(deps.logger, { component: 'cli' });
  const timer = startTimer();

  try {
    const parsed = summaryOptionsSchema.safeParse(rawOptions);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `--${e.path.join('.')}: ${e.message}`);
      throw new ConfigError(`Invalid options:\n${issues.join('\n')}`, {
        parameter: 'options',
        issues,
      });
    }
    const options = parsed.data;

    const loader =
      deps.loader ?? new SeriesLoader({ timezone: config.data.timezone, logger: deps.logger });
    const dataPath = options.data ?? config.data.path;
    const { series, rowsRead } = loader.getWithStats(dataPath);

    if (series.length === 0) {
      throw new LoadEmptyError(`No valid rows in ${dataPath}`, {
        source: dataPath,
        rowsRead,
      });
    }

    const dashboard = buildDashboard(
      series,
      {
        metric: options.metric ?? config.dashboard.metric,
        period: options.period ?? config.dashboard.period,
        start: options.from,
        end: options.to,
        year: options.year,
        timezone: config.data.timezone,
        movingAverages: {
          short: options.short ?? config.dashboard.movingAverages.short,
          long: options.long ?? config.dashboard.movingAverages.long,
        },
        volumeMaWindow: options.volumeMa ?? config.dashboard.volumeMaWindow,
      },
      logger
    );

    const formatter = new DashboardFormatter({
      color: options.color && !options.json,
      timezone: config.data.timezone,
    });
    stdout(formatter.format(dashboard, options.json ? 'json' : 'text'));

    logger.debug('Summary command complete', { duration_ms: timer.stop() });
    return EXIT_CODES.OK;
  } catch (error) {
    if (!isPriceLensError(error)) {
      throw error;
    }

    const code = exitCodeFor(error);
    logger.error('Summary command failed', { code: error.code, exit_code: code });
    stderr(chalk.red(`✖ ${error.message}`));
    return code;
  }
}
