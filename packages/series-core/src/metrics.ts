/**
 * Derived metrics.
 *
 * Every function here maps a sequence of (timestamp, value) points to a new
 * sequence of the same length and order. Absent results are `undefined`,
 * never NaN or Infinity; absent or non-finite inputs are treated as absent.
 */

import {
  ConfigError,
  type CrossoverEvents,
  type DerivedMetric,
  type DerivedPoint,
  type Direction,
} from '@pricelens/contracts';

/**
 * Input accepted by the metric functions: plain field points or the output of
 * another metric.
 */
export type NumericSeries = readonly DerivedPoint<number>[];

/**
 * Options for rollingMean.
 */
export interface RollingMeanOptions {
  /**
   * Valid values a window needs before it yields a mean.
   * @default 1 (partial windows at the start produce values)
   */
  minPeriods?: number;
}

function valueAt(series: NumericSeries, index: number): number | undefined {
  const value = series[index]?.value;
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

/**
 * Percent change from the previous point: `(v[i] - v[i-1]) / v[i-1] * 100`.
 *
 * The first point is absent, and so is any point whose previous value is 0.
 *
 * @example
 * ```typescript
 * percentChange(points([100, 110, 99]));
 * // values: [undefined, 10, -10]
 * ```
 */
export function percentChange(series: NumericSeries): DerivedMetric<number> {
  return series.map((point, index) => {
    const current = valueAt(series, index);
    const previous = index > 0 ? valueAt(series, index - 1) : undefined;

    if (current === undefined || previous === undefined || previous === 0) {
      return { timestamp: point.timestamp, value: undefined };
    }

    return { timestamp: point.timestamp, value: ((current - previous) / previous) * 100 };
  });
}

/**
 * Trailing moving average over `windowSize` points, no look-ahead.
 *
 * With the default `minPeriods = 1`, index i averages the latest
 * `min(i + 1, windowSize)` values, so the series is defined from its first
 * point. Absent values inside a window are skipped and do not count toward
 * `minPeriods`.
 *
 * @throws ConfigError if windowSize is not an integer >= 1, or minPeriods is
 * not an integer in [1, windowSize]
 *
 * @example
 * ```typescript
 * rollingMean(points([2, 4, 6, 8]), 2);
 * // values: [2, 3, 5, 7]
 *
 * rollingMean(points([2, 4, 6, 8]), 3, { minPeriods: 3 });
 * // values: [undefined, undefined, 4, 6]
 * ```
 *
 * Complexity: O(n * windowSize). Each window is summed afresh so a window of 1
 * returns its input exactly.
 */
export function rollingMean(
  series: NumericSeries,
  windowSize: number,
  options: RollingMeanOptions = {}
): DerivedMetric<number> {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new ConfigError(`Window size must be an integer >= 1, got ${windowSize}`, {
      parameter: 'windowSize',
      value: windowSize,
    });
  }

  const { minPeriods = 1 } = options;
  if (!Number.isInteger(minPeriods) || minPeriods < 1 || minPeriods > windowSize) {
    throw new ConfigError(
      `minPeriods must be an integer between 1 and ${windowSize}, got ${minPeriods}`,
      { parameter: 'minPeriods', value: minPeriods }
    );
  }

  return series.map((point, index) => {
    let sum = 0;
    let count = 0;
    for (let j = Math.max(0, index - windowSize + 1); j <= index; j++) {
      const value = valueAt(series, j);
      if (value !== undefined) {
        sum += value;
        count += 1;
      }
    }

    return {
      timestamp: point.timestamp,
      value: count >= minPeriods ? sum / count : undefined,
    };
  });
}

/**
 * Finds where a short moving average crosses a long one.
 *
 * - Up at i: `short[i-1] < long[i-1]` and `short[i] >= long[i]`
 * - Down at i: `short[i-1] > long[i-1]` and `short[i] <= long[i]`
 *
 * Index 0 never crosses. An index is skipped when any of the four values is
 * absent.
 *
 * @throws ConfigError if the two series differ in length
 *
 * @example
 * ```typescript
 * crossoverEvents(points([1, 3, 5]), points([4, 4, 4]));
 * // { up: [2], down: [] }
 * ```
 */
export function crossoverEvents(
  shortMA: NumericSeries,
  longMA: NumericSeries
): CrossoverEvents {
  if (shortMA.length !== longMA.length) {
    throw new ConfigError(
      `Moving averages must have equal length (${shortMA.length} vs ${longMA.length})`,
      { parameter: 'series', value: { short: shortMA.length, long: longMA.length } }
    );
  }

  const events: CrossoverEvents = { up: [], down: [] };

  for (let i = 1; i < shortMA.length; i++) {
    const prevShort = valueAt(shortMA, i - 1);
    const prevLong = valueAt(longMA, i - 1);
    const currShort = valueAt(shortMA, i);
    const currLong = valueAt(longMA, i);

    if (
      prevShort === undefined ||
      prevLong === undefined ||
      currShort === undefined ||
      currLong === undefined
    ) {
      continue;
    }

    if (prevShort < prevLong && currShort >= currLong) {
      events.up.push(i);
    } else if (prevShort > prevLong && currShort <= currLong) {
      events.down.push(i);
    }
  }

  return events;
}

/**
 * Direction of each point relative to the previous one.
 *
 * The first point is 'flat'; so is any comparison involving an absent value.
 *
 * @example
 * ```typescript
 * diffSign(points([5, 7, 7, 2]));
 * // values: ['flat', 'up', 'flat', 'down']
 * ```
 */
export function diffSign(series: NumericSeries): DerivedMetric<Direction> {
  return series.map((point, index) => {
    const current = valueAt(series, index);
    const previous = index > 0 ? valueAt(series, index - 1) : undefined;

    let direction: Direction = 'flat';
    if (current !== undefined && previous !== undefined) {
      if (current > previous) direction = 'up';
      else if (current < previous) direction = 'down';
    }

    return { timestamp: point.timestamp, value: direction };
  });
}

/**
 * Point-to-point difference `v[i] - v[i-1]`; absent at index 0.
 */
export function difference(series: NumericSeries): DerivedMetric<number> {
  return series.map((point, index) => {
    const current = valueAt(series, index);
    const previous = index > 0 ? valueAt(series, index - 1) : undefined;
    return {
      timestamp: point.timestamp,
      value: current === undefined || previous === undefined ? undefined : current - previous,
    };
  });
}
