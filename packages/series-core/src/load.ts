/**
 * Raw row loading.
 *
 * Turns rows read from a price file into a clean, time-ordered TimeSeries:
 * - Timestamps and numeric cells are parsed (see parse.ts)
 * - Rows whose timestamp or close does not parse are dropped silently
 * - Remaining rows are stably sorted ascending by timestamp
 *
 * Loading is a pure function of its input. An input that is not a table at all
 * raises LoadError; a table with no valid rows loads as an empty series.
 */

import {
  FIELD_COLUMNS,
  LoadError,
  PRICE_FIELDS,
  TIME_COLUMN,
  type PriceBar,
  type TimeSeries,
} from '@pricelens/contracts';
import type { Logger } from '@pricelens/logger';
import { DEFAULT_TIMEZONE } from './period.js';
import { parseNumber, parseTimestamp } from './parse.js';

/**
 * Options for load / loadWithStats.
 */
export interface LoadOptions {
  /** Zone for timestamps that carry no offset. @default 'UTC' */
  timezone?: string;

  /** Name of the source, used in errors and log entries. */
  source?: string;

  /** Receives the dropped-row count at debug level. */
  logger?: Logger;
}

/**
 * Load result with row accounting.
 */
export interface LoadResult {
  series: TimeSeries;
  rowsRead: number;
  rowsDropped: number;
}

/**
 * Columns every input table must have.
 */
export const REQUIRED_COLUMNS: readonly string[] = [
  TIME_COLUMN,
  ...PRICE_FIELDS.map((field) => FIELD_COLUMNS[field]),
];

/**
 * Loads rows into a TimeSeries.
 *
 * @param rows - Records keyed by column header (e.g. from readPriceCsv)
 * @returns Bars sorted ascending by timestamp; empty if no row is valid
 * @throws LoadError if `rows` is not an array of records or lacks a required column
 *
 * @example
 * ```typescript
 * const series = load([
 *   { 'Open time': '2021-01-02 00:00:00', Open: '730', High: '790', Low: '715', Close: '775', Volume: '1200' },
 *   { 'Open time': '2021-01-01 00:00:00', Open: '737', High: '749', Low: '714', Close: '730', Volume: '980' },
 *   { 'Open time': 'not a date',          Open: '1',   High: '1',   Low: '1',   Close: '1',   Volume: '1' },
 * ]);
 * // [bar for 2021-01-01, bar for 2021-01-02]
 * ```
 */
export function load(rows: unknown, options: LoadOptions = {}): TimeSeries {
  return loadWithStats(rows, options).series;
}

/**
 * Same as {@link load}, also reporting how many rows were read and dropped.
 */
export function loadWithStats(rows: unknown, options: LoadOptions = {}): LoadResult {
  const { timezone = DEFAULT_TIMEZONE, source, logger } = options;

  if (!Array.isArray(rows)) {
    throw new LoadError('Price input is not a list of rows', { source });
  }

  const records = rows.map((row: unknown, index) => {
    if (!isRecord(row)) {
      throw new LoadError(`Row ${index} is not a record`, { source, row: index });
    }
    return row;
  });

  const header = records[0];
  if (header !== undefined) {
    const missingColumns = REQUIRED_COLUMNS.filter((column) => !(column in header));
    if (missingColumns.length > 0) {
      throw new LoadError(`Missing required columns: ${missingColumns.join(', ')}`, {
        source,
        missingColumns,
      });
    }
  }

  const bars: PriceBar[] = [];
  for (const record of records) {
    const timestamp = parseTimestamp(record[TIME_COLUMN], timezone);
    const close = parseNumber(record[FIELD_COLUMNS.close]);
    if (timestamp === undefined || Number.isNaN(close)) {
      continue;
    }

    bars.push({
      timestamp,
      open: parseNumber(record[FIELD_COLUMNS.open]),
      high: parseNumber(record[FIELD_COLUMNS.high]),
      low: parseNumber(record[FIELD_COLUMNS.low]),
      close,
      volume: parseNumber(record[FIELD_COLUMNS.volume]),
    });
  }

  // Array.prototype.sort is stable: equal timestamps keep file order.
  bars.sort((a, b) => a.timestamp - b.timestamp);

  const rowsDropped = records.length - bars.length;
  if (rowsDropped > 0) {
    logger?.debug('Dropped unparsable rows', {
      dataset: source,
      rows_read: records.length,
      rows_dropped: rowsDropped,
    });
  }

  return { series: bars, rowsRead: records.length, rowsDropped };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
