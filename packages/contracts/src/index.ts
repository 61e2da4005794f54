/**
 * @fileoverview Main entry point for @pricelens/contracts.
 *
 * @module @pricelens/contracts
 */

// Periods
export { Period, isValidPeriod, getPeriodLabel, parsePeriod } from './periods.js';

// Series types
export type {
  PriceField,
  RawRow,
  PriceBar,
  TimeSeries,
  SeriesPoint,
  FieldSeries,
  DerivedPoint,
  DerivedMetric,
  Direction,
  Aggregation,
  FieldAggregations,
  CrossoverEvents,
  RangeSummary,
} from './series.js';

export { PRICE_FIELDS, FIELD_COLUMNS, TIME_COLUMN, isPriceField } from './series.js';

// Error classes and guards
export {
  PriceLensError,
  LoadError,
  LoadEmptyError,
  RangeEmptyError,
  ConfigError,
  isPriceLensError,
  isLoadError,
  isLoadEmptyError,
  isRangeEmptyError,
  isConfigError,
} from './errors.js';
