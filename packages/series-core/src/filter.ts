/**
 * Date range filtering.
 *
 * Extracts the contiguous run of bars whose timestamps fall inside an
 * inclusive range. The input is never modified; the result is a new array.
 */

import type { PriceBar, TimeSeries } from '@pricelens/contracts';

/**
 * Returns the bars with `start <= timestamp <= end`.
 *
 * Both bounds are inclusive and optional. Binary search finds the slice edges,
 * so the input must be sorted ascending (as `load` produces it).
 *
 * @param series - Bars sorted by timestamp ascending
 * @param start - First timestamp to keep (inclusive). Omitted: from the first bar.
 * @param end - Last timestamp to keep (inclusive). Omitted: to the last bar.
 * @returns Matching bars; empty when nothing falls in range
 *
 * @example
 * ```typescript
 * // bars at days 1, 2, 3, 4, 5
 * filterRange(bars, day(2), day(4));  // days 2, 3, 4
 * filterRange(bars, day(4));          // days 4, 5
 * filterRange(bars, undefined, day(1)); // day 1
 * filterRange(bars, day(4), day(2));  // []
 * ```
 *
 * Edge cases:
 * - Empty input: Returns empty array
 * - start > end: Returns empty array
 * - start === end: Returns the bars at exactly that instant
 * - Range covering the whole series: Returns an equal copy
 *
 * Complexity: O(log n + m) where m = output size
 */
export function filterRange(series: TimeSeries, start?: number, end?: number): PriceBar[] {
  if (series.length === 0) {
    return [];
  }

  const effectiveStart = start ?? -Infinity;
  const effectiveEnd = end ?? Infinity;

  if (effectiveStart > effectiveEnd) {
    return [];
  }

  const startIdx = firstIndexAtOrAfter(series, effectiveStart);
  if (startIdx === -1) {
    return [];
  }

  const endIdx = lastIndexAtOrBefore(series, effectiveEnd);
  if (endIdx === -1 || endIdx < startIdx) {
    return [];
  }

  return series.slice(startIdx, endIdx + 1);
}

/**
 * First index whose timestamp is >= target, or -1.
 */
function firstIndexAtOrAfter(series: TimeSeries, target: number): number {
  let left = 0;
  let right = series.length - 1;
  let result = -1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    const bar = series[mid];
    if (!bar) break;

    if (bar.timestamp >= target) {
      result = mid;
      right = mid - 1;
    } else {
      left = mid + 1;
    }
  }

  return result;
}

/**
 * Last index whose timestamp is <= target, or -1.
 */
function lastIndexAtOrBefore(series: TimeSeries, target: number): number {
  let left = 0;
  let right = series.length - 1;
  let result = -1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    const bar = series[mid];
    if (!bar) break;

    if (bar.timestamp <= target) {
      result = mid;
      left = mid + 1;
    } else {
      right = mid - 1;
    }
  }

  return result;
}

/**
 * Earliest and latest timestamps of a non-empty series.
 */
export function timeBounds(series: TimeSeries): { start: number; end: number } | undefined {
  const first = series[0];
  const last = series[series.length - 1];
  if (!first || !last) {
    return undefined;
  }
  return { start: first.timestamp, end: last.timestamp };
}
