/**
 * Calendar resampling.
 *
 * Groups daily bars into day, month or year buckets and reduces each bucket
 * with a per-field rule:
 * - 'last': value of the latest row in the bucket (prices)
 * - 'sum': sum of all rows in the bucket (volume)
 *
 * Buckets are labelled with midnight of their period's last day: the day
 * itself, the last day of the month, or December 31. Buckets with no rows are
 * never emitted (no zero-filling).
 */

import type {
  Aggregation,
  FieldAggregations,
  FieldSeries,
  Period,
  PriceBar,
  PriceField,
  TimeSeries,
} from '@pricelens/contracts';
import { DEFAULT_TIMEZONE, periodLabel } from './period.js';
import { dropMissing, selectField } from './select.js';

/**
 * Options for resample / resampleField.
 */
export interface ResampleOptions {
  /** Zone whose calendar defines the buckets. @default 'UTC' */
  timezone?: string;
}

/**
 * Aggregation applied to a field when none is given.
 */
export function defaultAggregation(field: PriceField): Aggregation {
  return field === 'volume' ? 'sum' : 'last';
}

/**
 * Reduces the values of one bucket.
 *
 * Non-finite values are skipped by both rules. A bucket with no finite value
 * sums to 0 but has no last value (NaN).
 *
 * @example
 * ```typescript
 * aggregateValues([10, 20, 30], 'sum');   // 60
 * aggregateValues([10, NaN], 'last');     // 10
 * aggregateValues([NaN, NaN], 'sum');     // 0
 * aggregateValues([NaN, NaN], 'last');    // NaN
 * ```
 */
export function aggregateValues(values: readonly number[], aggregation: Aggregation): number {
  const finite = values.filter((value) => Number.isFinite(value));

  if (aggregation === 'sum') {
    return finite.reduce((sum, value) => sum + value, 0);
  }

  return finite[finite.length - 1] ?? Number.NaN;
}

/**
 * Resamples bars into calendar buckets.
 *
 * @param series - Bars sorted by timestamp ascending
 * @param period - Bucket size
 * @param aggregations - Rule per field; unnamed fields use {@link defaultAggregation}
 * @returns One bar per non-empty bucket, ascending, timestamped at the period's last day
 *
 * @example
 * ```typescript
 * // three daily bars in March 2021 with volumes 10, 20, 30 and closes 1, 2, 3
 * resample(bars, Period.Month);
 * // [{ timestamp: Date.UTC(2021, 2, 31), close: 3, volume: 60, ... }]
 * ```
 *
 * Edge cases:
 * - Empty input: Returns empty array
 * - Gaps of whole periods: No bucket emitted for them
 *
 * Complexity: O(n)
 */
export function resample(
  series: TimeSeries,
  period: Period,
  aggregations: FieldAggregations = {},
  options: ResampleOptions = {}
): PriceBar[] {
  const { timezone = DEFAULT_TIMEZONE } = options;

  const groups = new Map<number, PriceBar[]>();
  for (const bar of series) {
    const label = periodLabel(bar.timestamp, period, timezone);
    const group = groups.get(label);
    if (group) {
      group.push(bar);
    } else {
      groups.set(label, [bar]);
    }
  }

  const rule = (field: PriceField): Aggregation => aggregations[field] ?? defaultAggregation(field);
  const labels = Array.from(groups.keys()).sort((a, b) => a - b);

  const resampled: PriceBar[] = [];
  for (const label of labels) {
    const group = groups.get(label);
    if (!group || group.length === 0) continue;

    const reduce = (field: PriceField): number =>
      aggregateValues(
        group.map((bar) => bar[field]),
        rule(field)
      );

    resampled.push({
      timestamp: label,
      open: reduce('open'),
      high: reduce('high'),
      low: reduce('low'),
      close: reduce('close'),
      volume: reduce('volume'),
    });
  }

  return resampled;
}

/**
 * Resamples a single field, dropping buckets whose aggregate is not finite
 * (a 'last' bucket in which no row has a value).
 *
 * @param aggregation - Defaults to 'sum' for volume and 'last' otherwise
 *
 * @example
 * ```typescript
 * resampleField(bars, 'close', Period.Year);  // year-end closes
 * resampleField(bars, 'volume', Period.Month); // monthly volume totals
 * ```
 */
export function resampleField(
  series: TimeSeries,
  field: PriceField,
  period: Period,
  aggregation: Aggregation = defaultAggregation(field),
  options: ResampleOptions = {}
): FieldSeries {
  const aggregations: FieldAggregations = {};
  aggregations[field] = aggregation;
  const bars = resample(series, period, aggregations, options);
  return dropMissing(selectField(bars, field));
}
