/**
 * Field selection: one column of a TimeSeries as (timestamp, value) points.
 */

import type { FieldSeries, PriceField, TimeSeries } from '@pricelens/contracts';

/**
 * Projects one field out of a series, keeping every row and its order.
 * Unparsed cells stay NaN; use {@link dropMissing} to remove them.
 *
 * @example
 * ```typescript
 * selectField(bars, 'close');
 * // [{ timestamp: t0, value: 730 }, { timestamp: t1, value: 775 }]
 * ```
 */
export function selectField(series: TimeSeries, field: PriceField): FieldSeries {
  return series.map((bar) => ({ timestamp: bar.timestamp, value: bar[field] }));
}

/**
 * Removes points whose value is not a finite number.
 */
export function dropMissing(points: FieldSeries): FieldSeries {
  return points.filter((point) => Number.isFinite(point.value));
}
