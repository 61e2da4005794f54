/**
 * Tests for the SeriesPipeline facade
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, Period } from '@pricelens/contracts';
import { SeriesPipeline } from '../src/pipeline.js';
import { rawRow, utc, values } from './fixtures.js';

describe('SeriesPipeline', () => {
  const rows = [
    rawRow('2021-01-30 00:00:00', '100', { Volume: '10' }),
    rawRow('2021-01-31 00:00:00', '110', { Volume: '20' }),
    rawRow('2021-02-01 00:00:00', '99', { Volume: '30' }),
    rawRow('2021-02-02 00:00:00', '121', { Volume: '40' }),
  ];

  it('should run load → filter → resample → metrics end to end', () => {
    const pipeline = new SeriesPipeline();
    const series = pipeline.load(rows, 'inline');
    const filtered = pipeline.filterDates(series, '2021-01-31', '2021-02-02');
    const monthly = pipeline.resampleField(filtered, 'close', Period.Month);

    expect(filtered).toHaveLength(3);
    expect(monthly).toEqual([
      { timestamp: utc(2021, 1, 31), value: 110 },
      { timestamp: utc(2021, 2, 28), value: 121 },
    ]);
    expect(values(pipeline.percentChange(monthly))[1]).toBeCloseTo(10, 10);
    expect(pipeline.summarize(monthly).changePct).toBeCloseTo(10, 10);
    expect(pipeline.resampleField(filtered, 'volume', Period.Month).map((p) => p.value)).toEqual([
      20, 70,
    ]);
  });

  it('should parse and bucket in its timezone', () => {
    const pipeline = new SeriesPipeline({ timezone: 'America/Sao_Paulo' });
    const series = pipeline.load(rows);

    expect(series[0]?.timestamp).toBe(utc(2021, 1, 30, 3));
    expect(pipeline.resample(series, Period.Month).map((b) => b.timestamp)).toEqual([
      utc(2021, 1, 31, 3),
      utc(2021, 2, 28, 3),
    ]);
  });

  it('should expose the window and crossover operations', () => {
    const pipeline = new SeriesPipeline();
    const closes = pipeline.load(rows).map((b) => ({ timestamp: b.timestamp, value: b.close }));

    const short = pipeline.rollingMean(closes, 1);
    const long = pipeline.rollingMean(closes, 3);

    expect(values(long)).toEqual([100, 105, 103, 110]);
    expect(pipeline.crossoverEvents(short, long)).toEqual({ up: [3], down: [2] });
    expect(values(pipeline.diffSign(closes))).toEqual(['flat', 'up', 'down', 'up']);
  });

  it('should reject an unknown timezone', () => {
    expect(() => new SeriesPipeline({ timezone: 'Atlantis/Capital' })).toThrow(ConfigError);
  });
});
