/**
 * @fileoverview Error taxonomy for PriceLens.
 *
 * Every reportable condition of the series pipeline is a PriceLensError with a
 * machine-readable code and a structured data payload. None of them is fatal to
 * the process: callers surface them to the user and halt the affected dataset
 * or view.
 *
 * @module @pricelens/contracts/errors
 */

/**
 * Base error class for all PriceLens errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new PriceLensError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class PriceLensError extends Error {
  /** Machine-readable error code (e.g. 'RANGE_EMPTY'). */
  readonly code: string;

  /** Structured context for logging and user-facing messages. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when the input cannot be read as a price table at all: the file is
 * missing, the CSV is malformed, or the required columns are absent.
 *
 * Individual rows that fail to parse are NOT load errors; they are dropped.
 */
export class LoadError extends PriceLensError {
  constructor(
    message: string,
    data: {
      source?: string;
      missingColumns?: string[];
      cause?: string;
      [key: string]: unknown;
    } = {}
  ) {
    super('LOAD_ERROR', message, data);
  }
}

/**
 * Thrown when a load produced zero valid rows. The caller halts every
 * computation for this dataset.
 */
export class LoadEmptyError extends PriceLensError {
  constructor(
    message: string,
    data: {
      source?: string;
      rowsRead: number;
      [key: string]: unknown;
    }
  ) {
    super('LOAD_EMPTY', message, data);
  }
}

/**
 * Thrown (or reported in a view outcome) when a filter, resample or metric
 * selection yields no points. Halts only the affected view.
 *
 * @example
 * ```typescript
 * throw new RangeEmptyError('No data for the selected interval', {
 *   view: 'evolution',
 *   start: '2030-01-01T00:00:00.000Z',
 * });
 * ```
 */
export class RangeEmptyError extends PriceLensError {
  constructor(
    message: string,
    data: {
      view?: string;
      start?: string;
      end?: string;
      [key: string]: unknown;
    } = {}
  ) {
    super('RANGE_EMPTY', message, data);
  }
}

/**
 * Thrown when a parameter is invalid. Values are never clamped or corrected;
 * the computation is rejected before it starts.
 */
export class ConfigError extends PriceLensError {
  constructor(
    message: string,
    data: {
      parameter?: string;
      value?: unknown;
      issues?: string[];
      [key: string]: unknown;
    } = {}
  ) {
    super('CONFIG_ERROR', message, data);
  }
}

/**
 * Type guard to check if an error is a PriceLensError.
 *
 * @example
 * ```typescript
 * try {
 *   pipeline.rollingMean(values, 0);
 * } catch (err) {
 *   if (isPriceLensError(err)) {
 *     console.error(`[${err.code}]`, err.message);
 *   }
 * }
 * ```
 */
export function isPriceLensError(error: unknown): error is PriceLensError {
  return error instanceof PriceLensError;
}

export function isLoadError(error: unknown): error is LoadError {
  return error instanceof LoadError;
}

export function isLoadEmptyError(error: unknown): error is LoadEmptyError {
  return error instanceof LoadEmptyError;
}

export function isRangeEmptyError(error: unknown): error is RangeEmptyError {
  return error instanceof RangeEmptyError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
