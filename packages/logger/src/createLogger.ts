/**
 * @fileoverview Logger factory for PriceLens.
 * Creates configured Winston logger instances with structured fields and
 * console/file transports.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - JSON output in production, pretty-print elsewhere (overridable)
 * - Console transport unless disabled, file transport when `filePath` is set
 * - Never exits the process on a logging error
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Dataset loaded', { dataset: 'eth.csv', rows: 2950 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', filePath: './logs/pricelens.log' });
 * const loaderLogger = logger.child({ component: 'series-loader' });
 * loaderLogger.debug('Cache hit', { dataset: 'eth.csv' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
  } = config;

  const outputFormat = json ? format.json() : prettyPrint;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: outputFormat,
        stderrLevels: stderr ? ['error', 'warn', 'info', 'debug'] : ['error'],
      })
    );
  }

  if (filePath) {
    // Files always get JSON lines; colors would end up as escape codes.
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.json(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: standardFields,
    transports,
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const viewLogger = createChildLogger(logger, { component: 'dashboard', view: 'candlestick' });
 * viewLogger.info('View built', { points: 365 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
