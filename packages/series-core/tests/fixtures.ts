/**
 * Shared builders for series-core tests.
 */

import type { DerivedPoint, PriceBar, RawRow } from '@pricelens/contracts';

export const DAY_MS = 86_400_000;

/**
 * Epoch ms for a UTC calendar date (month is 1-based).
 */
export function utc(year: number, month: number, day: number, hour = 0): number {
  return Date.UTC(year, month - 1, day, hour);
}

/**
 * A bar whose OHLC all equal `close` unless overridden.
 */
export function bar(timestamp: number, close: number, overrides: Partial<PriceBar> = {}): PriceBar {
  return {
    timestamp,
    open: close,
    high: close,
    low: close,
    close,
    volume: 100,
    ...overrides,
  };
}

/**
 * Consecutive daily bars starting at `start` with the given closes.
 */
export function dailyBars(start: number, closes: number[]): PriceBar[] {
  return closes.map((close, i) => bar(start + i * DAY_MS, close));
}

/**
 * Points one day apart starting at day 0 of 2021.
 */
export function points(values: Array<number | undefined>): DerivedPoint<number>[] {
  const start = utc(2021, 1, 1);
  return values.map((value, i) => ({ timestamp: start + i * DAY_MS, value }));
}

export function values<T>(metric: readonly DerivedPoint<T>[]): Array<T | undefined> {
  return metric.map((point) => point.value);
}

/**
 * A raw row as read from the CSV.
 */
export function rawRow(
  openTime: string,
  close: string,
  overrides: Partial<Record<'Open' | 'High' | 'Low' | 'Volume', string>> = {}
): RawRow {
  return {
    'Open time': openTime,
    Open: overrides.Open ?? close,
    High: overrides.High ?? close,
    Low: overrides.Low ?? close,
    Close: close,
    Volume: overrides.Volume ?? '100',
  };
}
