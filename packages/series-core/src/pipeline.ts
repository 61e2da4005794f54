/**
 * SeriesPipeline: the pipeline operations bound to one timezone and logger.
 *
 * Holds no state of its own; each method delegates to the pure function of the
 * same name. Use it where a single calendar configuration should apply to
 * loading, filtering and resampling alike.
 */

import type {
  Aggregation,
  CrossoverEvents,
  DerivedMetric,
  Direction,
  FieldAggregations,
  FieldSeries,
  Period,
  PriceBar,
  PriceField,
  RangeSummary,
  TimeSeries,
} from '@pricelens/contracts';
import type { Logger } from '@pricelens/logger';
import { filterRange } from './filter.js';
import { load, loadWithStats, type LoadResult } from './load.js';
import {
  crossoverEvents,
  diffSign,
  percentChange,
  rollingMean,
  type NumericSeries,
  type RollingMeanOptions,
} from './metrics.js';
import { DEFAULT_TIMEZONE, assertTimezone, dateRange } from './period.js';
import { defaultAggregation, resample, resampleField } from './resample.js';
import { summarize } from './summary.js';

export interface SeriesPipelineOptions {
  /** Calendar zone for parsing and bucketing. @default 'UTC' */
  timezone?: string;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const pipeline = new SeriesPipeline({ timezone: 'UTC' });
 * const series = pipeline.load(readPriceCsv('eth.csv'));
 * const monthly = pipeline.resampleField(series, 'close', Period.Month);
 * const returns = pipeline.percentChange(monthly);
 * ```
 */
export class SeriesPipeline {
  readonly timezone: string;
  private readonly logger?: Logger;

  constructor(options: SeriesPipelineOptions = {}) {
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
    assertTimezone(this.timezone);
    this.logger = options.logger;
  }

  load(rows: unknown, source?: string): TimeSeries {
    return load(rows, { timezone: this.timezone, source, logger: this.logger });
  }

  loadWithStats(rows: unknown, source?: string): LoadResult {
    return loadWithStats(rows, { timezone: this.timezone, source, logger: this.logger });
  }

  filterRange(series: TimeSeries, start?: number, end?: number): PriceBar[] {
    return filterRange(series, start, end);
  }

  /**
   * Filters by calendar dates (`YYYY-MM-DD`), both days included in full.
   */
  filterDates(series: TimeSeries, startDate?: string, endDate?: string): PriceBar[] {
    const { start, end } = dateRange(startDate, endDate, this.timezone);
    return filterRange(series, start, end);
  }

  resample(series: TimeSeries, period: Period, aggregations: FieldAggregations = {}): PriceBar[] {
    return resample(series, period, aggregations, { timezone: this.timezone });
  }

  resampleField(
    series: TimeSeries,
    field: PriceField,
    period: Period,
    aggregation: Aggregation = defaultAggregation(field)
  ): FieldSeries {
    return resampleField(series, field, period, aggregation, { timezone: this.timezone });
  }

  percentChange(series: NumericSeries): DerivedMetric<number> {
    return percentChange(series);
  }

  rollingMean(
    series: NumericSeries,
    windowSize: number,
    options?: RollingMeanOptions
  ): DerivedMetric<number> {
    return rollingMean(series, windowSize, options);
  }

  crossoverEvents(shortMA: NumericSeries, longMA: NumericSeries): CrossoverEvents {
    return crossoverEvents(shortMA, longMA);
  }

  diffSign(series: NumericSeries): DerivedMetric<Direction> {
    return diffSign(series);
  }

  summarize(series: NumericSeries): RangeSummary {
    return summarize(series);
  }
}
