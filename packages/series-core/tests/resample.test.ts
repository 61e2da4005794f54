/**
 * Tests for calendar resampling
 */

import { describe, it, expect } from 'vitest';
import { Period } from '@pricelens/contracts';
import { aggregateValues, defaultAggregation, resample, resampleField } from '../src/resample.js';
import { DAY_MS, bar, dailyBars, utc } from './fixtures.js';

describe('aggregateValues', () => {
  it('should sum and take the last value', () => {
    expect(aggregateValues([10, 20, 30], 'sum')).toBe(60);
    expect(aggregateValues([10, 20, 30], 'last')).toBe(30);
  });

  it('should skip NaN values', () => {
    expect(aggregateValues([10, Number.NaN], 'last')).toBe(10);
    expect(aggregateValues([10, Number.NaN, 5], 'sum')).toBe(15);
  });

  it('should sum a bucket without finite values to zero', () => {
    expect(aggregateValues([Number.NaN], 'sum')).toBe(0);
    expect(aggregateValues([Number.NaN, Number.NaN], 'sum')).toBe(0);
  });

  it('should have no last value for a bucket without finite values', () => {
    expect(aggregateValues([Number.NaN], 'last')).toBeNaN();
    expect(aggregateValues([], 'last')).toBeNaN();
  });
});

describe('defaultAggregation', () => {
  it('should sum volume and keep the last price', () => {
    expect(defaultAggregation('volume')).toBe('sum');
    expect(defaultAggregation('close')).toBe('last');
    expect(defaultAggregation('open')).toBe('last');
  });
});

describe('resample', () => {
  it('should sum volume and keep the last close within a month', () => {
    const bars = [
      bar(utc(2021, 3, 1), 1, { volume: 10 }),
      bar(utc(2021, 3, 2), 2, { volume: 20 }),
      bar(utc(2021, 3, 3), 3, { volume: 30 }),
    ];

    expect(resample(bars, Period.Month)).toEqual([
      { timestamp: utc(2021, 3, 31), open: 3, high: 3, low: 3, close: 3, volume: 60 },
    ]);
  });

  it('should produce one bucket for a series spanning exactly one year', () => {
    const year = dailyBars(
      utc(2021, 1, 1),
      Array.from({ length: 365 }, (_, i) => i + 1)
    );

    const result = resample(year, Period.Year);

    expect(result).toHaveLength(1);
    expect(result[0]?.timestamp).toBe(utc(2021, 12, 31));
    expect(result[0]?.close).toBe(365);
    expect(result[0]?.volume).toBe(36_500);
  });

  it('should omit empty buckets instead of zero-filling them', () => {
    const bars = [bar(utc(2021, 1, 15), 1), bar(utc(2021, 4, 15), 2)];

    expect(resample(bars, Period.Month).map((b) => b.timestamp)).toEqual([
      utc(2021, 1, 31),
      utc(2021, 4, 30),
    ]);
  });

  it('should let the latest row win ties for last', () => {
    const bars = [
      bar(utc(2021, 5, 1), 1),
      bar(utc(2021, 5, 20), 5),
      bar(utc(2021, 5, 20), 6),
    ];

    expect(resample(bars, Period.Month)[0]?.close).toBe(6);
  });

  it('should apply per-field aggregations', () => {
    const bars = [bar(utc(2021, 5, 1), 1, { volume: 4 }), bar(utc(2021, 5, 2), 2, { volume: 6 })];

    const result = resample(bars, Period.Month, { close: 'sum', volume: 'last' });

    expect(result[0]?.close).toBe(3);
    expect(result[0]?.volume).toBe(6);
  });

  it('should keep one bucket per day for daily data', () => {
    const bars = dailyBars(utc(2021, 1, 1), [1, 2, 3]);

    expect(resample(bars, Period.Day)).toEqual(bars);
  });

  it('should merge intraday rows into their day', () => {
    const bars = [bar(utc(2021, 1, 1, 0), 1), bar(utc(2021, 1, 1, 12), 2), bar(utc(2021, 1, 2, 0), 3)];

    expect(resample(bars, Period.Day).map((b) => [b.timestamp, b.close])).toEqual([
      [utc(2021, 1, 1), 2],
      [utc(2021, 1, 2), 3],
    ]);
  });

  it('should return an empty array for empty input', () => {
    expect(resample([], Period.Year)).toEqual([]);
  });

  it('should bucket in the configured timezone', () => {
    const bars = [bar(utc(2021, 1, 1, 1), 1), bar(utc(2021, 1, 1, 6), 2)];

    const result = resample(bars, Period.Month, {}, { timezone: 'America/New_York' });

    expect(result.map((b) => b.timestamp)).toEqual([utc(2020, 12, 31, 5), utc(2021, 1, 31, 5)]);
  });

  it('should not modify the input', () => {
    const bars = dailyBars(utc(2021, 1, 1), [1, 2]);
    const copy = bars.map((b) => ({ ...b }));

    resample(bars, Period.Year);

    expect(bars).toEqual(copy);
  });
});

describe('resampleField', () => {
  const bars = [
    bar(utc(2021, 1, 10), 100, { volume: 5 }),
    bar(utc(2021, 1, 20), 110, { volume: 7 }),
    bar(utc(2021, 2, 10), 99, { volume: Number.NaN }),
  ];

  it('should return last closes per month by default', () => {
    expect(resampleField(bars, 'close', Period.Month)).toEqual([
      { timestamp: utc(2021, 1, 31), value: 110 },
      { timestamp: utc(2021, 2, 28), value: 99 },
    ]);
  });

  it('should label January data with January 31', () => {
    const january = [bar(utc(2021, 1, 10), 1), bar(utc(2021, 1, 20), 2)];

    expect(resampleField(january, 'close', Period.Month)[0]?.timestamp).toBe(utc(2021, 1, 31));
  });

  it('should label a year with December 31', () => {
    expect(resampleField(bars, 'close', Period.Year)).toEqual([
      { timestamp: utc(2021, 12, 31), value: 99 },
    ]);
  });

  it('should sum a month whose volume cells are all blank to zero', () => {
    expect(resampleField(bars, 'volume', Period.Month)).toEqual([
      { timestamp: utc(2021, 1, 31), value: 12 },
      { timestamp: utc(2021, 2, 28), value: 0 },
    ]);
  });

  it('should keep a day with blank volume as zero volume', () => {
    const days = [
      bar(utc(2021, 1, 1), 1, { volume: 5 }),
      bar(utc(2021, 1, 2), 2, { volume: Number.NaN }),
      bar(utc(2021, 1, 3), 3, { volume: 7 }),
    ];

    expect(resampleField(days, 'volume', Period.Day)).toEqual([
      { timestamp: utc(2021, 1, 1), value: 5 },
      { timestamp: utc(2021, 1, 2), value: 0 },
      { timestamp: utc(2021, 1, 3), value: 7 },
    ]);
  });

  it('should drop a bucket with no last value', () => {
    const withBlankOpen = bars.map((b, i) => (i === 2 ? { ...b, open: Number.NaN } : b));

    expect(resampleField(withBlankOpen, 'open', Period.Month)).toEqual([
      { timestamp: utc(2021, 1, 31), value: 110 },
    ]);
  });

  it('should accept an explicit aggregation', () => {
    expect(resampleField(bars, 'volume', Period.Year, 'last')).toEqual([
      { timestamp: utc(2021, 12, 31), value: 7 },
    ]);
  });

  it('should keep daily spacing with gaps', () => {
    const gappy = [bar(utc(2021, 1, 1), 1), bar(utc(2021, 1, 1) + 3 * DAY_MS, 2)];

    expect(resampleField(gappy, 'close', Period.Day).map((p) => p.value)).toEqual([1, 2]);
  });
});
