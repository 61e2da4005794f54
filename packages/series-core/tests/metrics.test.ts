/**
 * Tests for derived metrics
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '@pricelens/contracts';
import {
  crossoverEvents,
  diffSign,
  difference,
  percentChange,
  rollingMean,
} from '../src/metrics.js';
import { summarize } from '../src/summary.js';
import { points, values } from './fixtures.js';

describe('percentChange', () => {
  it('should compute change from the previous point', () => {
    const result = values(percentChange(points([100, 110, 99])));

    expect(result[0]).toBeUndefined();
    expect(result[1]).toBeCloseTo(10, 10);
    expect(result[2]).toBeCloseTo(-10, 10);
  });

  it('should keep timestamps and length', () => {
    const input = points([1, 2, 3]);
    const result = percentChange(input);

    expect(result.map((p) => p.timestamp)).toEqual(input.map((p) => p.timestamp));
  });

  it('should mark division by zero as absent', () => {
    expect(values(percentChange(points([0, 5, 10])))).toEqual([undefined, undefined, 100]);
  });

  it('should mark points next to absent or NaN values as absent', () => {
    expect(values(percentChange(points([10, undefined, 20, Number.NaN, 30])))).toEqual([
      undefined,
      undefined,
      undefined,
      undefined,
      undefined,
    ]);
  });

  it('should return an empty metric for an empty series', () => {
    expect(percentChange([])).toEqual([]);
  });
});

describe('rollingMean', () => {
  it('should be the identity for a window of 1', () => {
    const input = points([0.1, 0.2, 0.3, 1234.5678]);

    expect(rollingMean(input, 1)).toEqual(input);
  });

  it('should average partial windows at the start', () => {
    expect(values(rollingMean(points([2, 4, 6, 8]), 2))).toEqual([2, 3, 5, 7]);
    expect(values(rollingMean(points([3, 6, 9, 12]), 3))).toEqual([3, 4.5, 6, 9]);
  });

  it('should average everything so far when the window exceeds the series', () => {
    expect(values(rollingMean(points([1, 2, 3]), 10))).toEqual([1, 1.5, 2]);
  });

  it('should honour minPeriods for full windows', () => {
    expect(values(rollingMean(points([2, 4, 6, 8]), 3, { minPeriods: 3 }))).toEqual([
      undefined,
      undefined,
      4,
      6,
    ]);
  });

  it('should skip absent values inside a window', () => {
    expect(values(rollingMean(points([2, undefined, 6]), 2))).toEqual([2, 2, 6]);
    expect(values(rollingMean(points([undefined, 4]), 2))).toEqual([undefined, 4]);
  });

  it('should reject invalid window sizes with ConfigError', () => {
    expect(() => rollingMean(points([1]), 0)).toThrow(ConfigError);
    expect(() => rollingMean(points([1]), -3)).toThrow(ConfigError);
    expect(() => rollingMean(points([1]), 2.5)).toThrow('Window size must be an integer >= 1, got 2.5');
  });

  it('should reject minPeriods outside [1, window]', () => {
    expect(() => rollingMean(points([1]), 3, { minPeriods: 4 })).toThrow(
      'minPeriods must be an integer between 1 and 3, got 4'
    );
    expect(() => rollingMean(points([1]), 3, { minPeriods: 0 })).toThrow(ConfigError);
  });
});

describe('crossoverEvents', () => {
  it('should find a single up-crossing', () => {
    expect(crossoverEvents(points([1, 3, 5]), points([4, 4, 4]))).toEqual({ up: [2], down: [] });
  });

  it('should find a down-crossing, including touching from above', () => {
    expect(crossoverEvents(points([6, 5, 4]), points([4, 4, 4]))).toEqual({ up: [], down: [2] });
  });

  it('should count touching from below as an up-crossing', () => {
    expect(crossoverEvents(points([3, 4]), points([4, 4]))).toEqual({ up: [1], down: [] });
  });

  it('should not count a move away from equality', () => {
    expect(crossoverEvents(points([4, 5, 3]), points([4, 4, 4]))).toEqual({ up: [], down: [2] });
  });

  it('should find alternating crossings', () => {
    const short = points([1, 5, 1, 5, 1]);
    const long = points([3, 3, 3, 3, 3]);

    expect(crossoverEvents(short, long)).toEqual({ up: [1, 3], down: [2, 4] });
  });

  it('should never report index 0', () => {
    expect(crossoverEvents(points([5]), points([1]))).toEqual({ up: [], down: [] });
  });

  it('should exclude indices with an absent value at i or i-1', () => {
    const short = points([1, undefined, 5, 1, 5]);
    const long = points([3, 3, 3, undefined, 3]);

    expect(crossoverEvents(short, long)).toEqual({ up: [], down: [] });
  });

  it('should reject series of different length', () => {
    expect(() => crossoverEvents(points([1, 2]), points([1]))).toThrow(ConfigError);
  });
});

describe('diffSign', () => {
  it('should start flat and follow the sign of the change', () => {
    expect(values(diffSign(points([5, 7, 7, 2])))).toEqual(['flat', 'up', 'flat', 'down']);
  });

  it('should be flat around absent values', () => {
    expect(values(diffSign(points([5, undefined, 7])))).toEqual(['flat', 'flat', 'flat']);
  });
});

describe('difference', () => {
  it('should subtract the previous value', () => {
    expect(values(difference(points([10, 25, 20])))).toEqual([undefined, 15, -5]);
  });
});

describe('summarize', () => {
  it('should report first, last and percent change', () => {
    expect(summarize(points([200, 150, 250]))).toEqual({ first: 200, last: 250, changePct: 25 });
  });

  it('should ignore absent endpoints', () => {
    expect(summarize(points([undefined, 50, 100, undefined]))).toEqual({
      first: 50,
      last: 100,
      changePct: 100,
    });
  });

  it('should leave the change undefined when the first value is zero', () => {
    expect(summarize(points([0, 10]))).toEqual({ first: 0, last: 10, changePct: undefined });
  });

  it('should throw RangeEmptyError for a series without values', () => {
    expect(() => summarize(points([undefined]))).toThrow('Cannot summarize a series with no values');
  });
});
