/**
 * @fileoverview Type definitions for the PriceLens logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that stop a command
 * - 'warn': Conditions the user should see (empty views, rejected parameters)
 * - 'info': Normal operations (dataset loaded, dashboard built)
 * - 'debug': Cache hits, dropped-row counts, per-view timings
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/pricelens.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Send console output to stderr instead of stdout, keeping stdout free for
   * command output.
   * @default false
   */
  stderr?: boolean;
}

/**
 * Child logger context fields.
 * Included in every entry written by the child logger.
 *
 * @example
 * ```typescript
 * const viewLogger = logger.child({ component: 'dashboard', view: 'evolution' });
 * viewLogger.warn('No data for the selected interval');
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g. 'series-loader', 'dashboard', 'cli') */
  component?: string;

  /** Data source path or name */
  dataset?: string;

  /** Dashboard view name */
  view?: string;

  /** Resample period */
  period?: string;

  /** Allow any additional context fields */
  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so packages depend on this one only.
 */
export type Logger = WinstonLogger;
