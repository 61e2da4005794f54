/**
 * Range summary scalars: first value, last value and the percent change
 * between them (same formula as percentChange, applied to the endpoints).
 */

import { RangeEmptyError, type RangeSummary } from '@pricelens/contracts';
import type { NumericSeries } from './metrics.js';

/**
 * Summarizes a series by its first and last finite values.
 *
 * @throws RangeEmptyError if the series has no finite value
 *
 * @example
 * ```typescript
 * summarize(points([200, 150, 250]));
 * // { first: 200, last: 250, changePct: 25 }
 *
 * summarize(points([0, 10]));
 * // { first: 0, last: 10, changePct: undefined }
 * ```
 */
export function summarize(series: NumericSeries): RangeSummary {
  const values = series
    .map((point) => point.value)
    .filter((value): value is number => value !== undefined && Number.isFinite(value));

  const first = values[0];
  const last = values[values.length - 1];
  if (first === undefined || last === undefined) {
    throw new RangeEmptyError('Cannot summarize a series with no values');
  }

  return {
    first,
    last,
    changePct: first === 0 ? undefined : ((last - first) / first) * 100,
  };
}
