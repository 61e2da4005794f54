/**
 * @pricelens/series-core
 *
 * Pure time-series derivation for daily OHLCV price data: loading and
 * cleaning raw rows, date-range filtering, calendar resampling and derived
 * metrics (percent change, rolling mean, crossovers, direction).
 *
 * Every operation returns a new sequence; inputs are never modified. Apart
 * from the memoized SeriesLoader, nothing holds state across calls.
 *
 * @example
 * ```typescript
 * import { SeriesLoader, resampleField, percentChange } from '@pricelens/series-core';
 * import { Period } from '@pricelens/contracts';
 *
 * const series = new SeriesLoader().get('eth_1d_data_2017_to_2025.csv');
 * const monthEnds = resampleField(series, 'close', Period.Month);
 * const returns = percentChange(monthEnds);
 * ```
 *
 * @packageDocumentation
 */

// Loading
export { load, loadWithStats, REQUIRED_COLUMNS } from './load.js';
export type { LoadOptions, LoadResult } from './load.js';
export { parseTimestamp, parseNumber, TIMESTAMP_FORMATS } from './parse.js';
export { readPriceCsv, parsePriceCsv } from './csv.js';
export { SeriesLoader } from './loader.js';
export type { SeriesLoaderOptions } from './loader.js';

// Calendar
export {
  DEFAULT_TIMEZONE,
  assertTimezone,
  periodStart,
  periodLabel,
  yearOf,
  yearBounds,
  dateRange,
} from './period.js';

// Filtering and resampling
export { filterRange, timeBounds } from './filter.js';
export { selectField, dropMissing } from './select.js';
export { resample, resampleField, aggregateValues, defaultAggregation } from './resample.js';
export type { ResampleOptions } from './resample.js';

// Derived metrics
export { percentChange, rollingMean, crossoverEvents, diffSign, difference } from './metrics.js';
export type { NumericSeries, RollingMeanOptions } from './metrics.js';
export { summarize } from './summary.js';

// Bound facade
export { SeriesPipeline } from './pipeline.js';
export type { SeriesPipelineOptions } from './pipeline.js';
