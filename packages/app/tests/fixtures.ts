/**
 * Shared series for app tests.
 */

import type { PriceBar } from '@pricelens/contracts';

export function utc(year: number, month: number, day: number): number {
  return Date.UTC(year, month - 1, day);
}

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
 * Six days across three months:
 *
 * | date       | close | volume |
 * |------------|-------|--------|
 * | 2020-12-31 | 100   | 10     |
 * | 2021-01-01 | 110   | 20     |
 * | 2021-01-15 | 120   | 5      |
 * | 2021-01-31 | 130   | 15     |
 * | 2021-02-01 | 117   | 15     |
 * | 2021-02-28 | 143   | 40     |
 */
export function sampleSeries(): PriceBar[] {
  return [
    bar(utc(2020, 12, 31), 100, { volume: 10 }),
    bar(utc(2021, 1, 1), 110, { volume: 20 }),
    bar(utc(2021, 1, 15), 120, { volume: 5 }),
    bar(utc(2021, 1, 31), 130, { volume: 15 }),
    bar(utc(2021, 2, 1), 117, { volume: 15 }),
    bar(utc(2021, 2, 28), 143, { volume: 40 }),
  ];
}

/**
 * The sample series as CSV text.
 */
export function sampleCsv(): string {
  const rows = sampleSeries().map((b) => {
    const day = new Date(b.timestamp).toISOString().slice(0, 10);
    return `${day} 00:00:00,${b.open},${b.high},${b.low},${b.close},${b.volume}`;
  });
  return ['Open time,Open,High,Low,Close,Volume', ...rows].join('\n');
}
