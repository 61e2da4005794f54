/**
 * Commander program definition for the pricelens CLI.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createLogger, type Logger } from '@pricelens/logger';
import { loadConfig, type Config } from './config/index.js';
import { EXIT_CODES, runSummary, type SummaryOptions } from './commands/summary.command.js';

export interface ProgramIO {
  env?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Receives the command's exit code. */
  exit?: (code: number) => void;
  /** Logger to use instead of one built from config. */
  logger?: Logger;
}

/**
 * Creates the `pricelens` program.
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(['node', 'pricelens', 'summary', '--period', 'year']);
 * ```
 */
export function createProgram(io: ProgramIO = {}): Command {
  const stdout = io.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const stderr = io.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));
  const exit =
    io.exit ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();

  program
    .name('pricelens')
    .description('Chart-ready series and summaries from a daily OHLCV price file')
    .version('0.1.0');

  program
    .command('summary')
    .description('Build the dashboard for a dataset and print a report')
    .option('-d, --data <path>', 'Price CSV file (overrides PRICELENS_DATA_PATH)')
    .option('-m, --metric <field>', 'Metric: open, high, low, close or volume')
    .option('-p, --period <period>', 'Resample period: day, month or year')
    .option('--from <date>', 'First day to include (YYYY-MM-DD)')
    .option('--to <date>', 'Last day to include (YYYY-MM-DD)')
    .option('-y, --year <year>', 'Year for the candlestick view (default: latest)')
    .option('--short <days>', 'Short moving-average window')
    .option('--long <days>', 'Long moving-average window')
    .option('--volume-ma <days>', 'Volume moving-average window')
    .option('--json', 'Print the JSON snapshot instead of the text report', false)
    .option('--no-color', 'Disable colored output')
    .action((_options: unknown, command: Command) => {
      let config: Config;
      try {
        config = loadConfig(io.env ?? process.env);
      } catch (error) {
        stderr(chalk.red(`✖ ${error instanceof Error ? error.message : String(error)}`));
        exit(EXIT_CODES.INVALID_INPUT);
        return;
      }

      const logger =
        io.logger ??
        createLogger({
          level: config.logging.level,
          json: config.logging.format === 'json',
          filePath: config.logging.filePath,
          stderr: true,
        });

      const options: SummaryOptions = command.opts();
      exit(runSummary(options, { config, logger, stdout, stderr }));
    });

  return program;
}
