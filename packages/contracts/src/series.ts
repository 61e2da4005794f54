/**
 * @fileoverview Price series types shared by the pipeline and the dashboard.
 *
 * All timestamps are Unix epoch milliseconds (UTC). Sequences are read-only:
 * every derived view is a new array, never an in-place edit of its source.
 *
 * @module @pricelens/contracts/series
 */

/**
 * Numeric fields of a daily price record.
 */
export type PriceField = 'open' | 'high' | 'low' | 'close' | 'volume';

/**
 * All price fields in column order.
 */
export const PRICE_FIELDS: readonly PriceField[] = ['open', 'high', 'low', 'close', 'volume'];

/**
 * Column header used for each field in the input file.
 */
export const FIELD_COLUMNS: Readonly<Record<PriceField, string>> = {
  open: 'Open',
  high: 'High',
  low: 'Low',
  close: 'Close',
  volume: 'Volume',
};

/**
 * Column header holding the row timestamp.
 */
export const TIME_COLUMN = 'Open time';

/**
 * Validates whether a string names a price field.
 *
 * @example
 * ```typescript
 * isPriceField('close')  // true
 * isPriceField('Close')  // false
 * ```
 */
export function isPriceField(value: string): value is PriceField {
  return PRICE_FIELDS.some((field) => field === value);
}

/**
 * One input record as read from the file: column header → cell text.
 *
 * The pipeline only looks at {@link TIME_COLUMN} and the {@link FIELD_COLUMNS};
 * other columns are ignored.
 */
export type RawRow = Readonly<Record<string, string | undefined>>;

/**
 * One cleaned daily record.
 *
 * `timestamp` and `close` are always finite. The other fields are NaN when the
 * source cell did not parse.
 */
export interface PriceBar {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Ordered bars, non-decreasing by timestamp.
 */
export type TimeSeries = readonly PriceBar[];

/**
 * One value of a single field at a point in time.
 */
export interface SeriesPoint {
  timestamp: number;
  value: number;
}

/**
 * A single field of a TimeSeries, in the same order.
 */
export type FieldSeries = readonly SeriesPoint[];

/**
 * One value of a derived metric. `undefined` marks an absent point
 * (first sample of a difference, division by zero, warm-up of a window).
 */
export interface DerivedPoint<T> {
  timestamp: number;
  value: T | undefined;
}

/**
 * A sequence computed pointwise or windowed from a source series; same length
 * and timestamp order as the source.
 */
export type DerivedMetric<T = number> = readonly DerivedPoint<T>[];

/**
 * Sign of the change from the previous sample.
 */
export type Direction = 'up' | 'down' | 'flat';

/**
 * How values are combined inside a resample bucket.
 */
export type Aggregation = 'last' | 'sum';

/**
 * Per-field aggregation rules for a bar resample.
 */
export type FieldAggregations = Partial<Record<PriceField, Aggregation>>;

/**
 * Indices where a short moving average crosses a long one.
 */
export interface CrossoverEvents {
  /** Short crosses from below to at-or-above the long average. */
  up: number[];
  /** Short crosses from above to at-or-below the long average. */
  down: number[];
}

/**
 * First value, last value and percent change over a range.
 */
export interface RangeSummary {
  first: number;
  last: number;
  /** `undefined` when the first value is zero or not finite. */
  changePct: number | undefined;
}
