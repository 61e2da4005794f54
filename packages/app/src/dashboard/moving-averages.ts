/**
 * Dual moving-average trend view with crossover markers.
 */

import { ConfigError, type TimeSeries } from '@pricelens/contracts';
import { crossoverEvents, rollingMean, selectField } from '@pricelens/series-core';
import type { DashboardRequest } from './request.js';
import type { CrossoverPoint, MovingAveragesView } from './types.js';

export const SHORT_WINDOW_LIMITS = { min: 2, max: 120 } as const;
export const LONG_WINDOW_LIMITS = { min: 3, max: 240 } as const;

/**
 * @throws ConfigError if a window is out of bounds or short >= long
 */
export function validateWindows(short: number, long: number): void {
  if (short < SHORT_WINDOW_LIMITS.min || short > SHORT_WINDOW_LIMITS.max) {
    throw new ConfigError(
      `Short window must be between ${SHORT_WINDOW_LIMITS.min} and ${SHORT_WINDOW_LIMITS.max}, got ${short}`,
      { parameter: 'movingAverages.short', value: short }
    );
  }
  if (long < LONG_WINDOW_LIMITS.min || long > LONG_WINDOW_LIMITS.max) {
    throw new ConfigError(
      `Long window must be between ${LONG_WINDOW_LIMITS.min} and ${LONG_WINDOW_LIMITS.max}, got ${long}`,
      { parameter: 'movingAverages.long', value: long }
    );
  }
  if (short >= long) {
    throw new ConfigError(`Short window (${short}) must be smaller than long window (${long})`, {
      parameter: 'movingAverages',
      value: { short, long },
    });
  }
}

/**
 * Short and long trailing means of close. Each mean is absent until its
 * window is full.
 */
export function buildMovingAverages(
  series: TimeSeries,
  request: DashboardRequest
): MovingAveragesView {
  const { short, long } = request.movingAverages;
  validateWindows(short, long);

  const closes = selectField(series, 'close');
  const shortMA = rollingMean(closes, short, { minPeriods: short });
  const longMA = rollingMean(closes, long, { minPeriods: long });
  const events = crossoverEvents(shortMA, longMA);

  const toPoints = (indices: number[]): CrossoverPoint[] =>
    indices.flatMap((index) => {
      const point = shortMA[index];
      if (!point || point.value === undefined) return [];
      return [{ index, timestamp: point.timestamp, value: point.value }];
    });

  return {
    short,
    long,
    points: series.map((bar, index) => ({
      timestamp: bar.timestamp,
      close: bar.close,
      short: shortMA[index]?.value,
      long: longMA[index]?.value,
    })),
    crossovers: {
      up: toPoints(events.up),
      down: toPoints(events.down),
    },
  };
}
