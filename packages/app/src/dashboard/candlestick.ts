/**
 * Annual candlestick view.
 */

import { RangeEmptyError, type TimeSeries } from '@pricelens/contracts';
import { filterRange, selectField, summarize, yearBounds, yearOf } from '@pricelens/series-core';
import type { DashboardRequest } from './request.js';
import type { CandlestickView } from './types.js';

/**
 * Daily bars of one calendar year, defaulting to the latest year in range.
 *
 * @throws RangeEmptyError if the requested year has no rows
 */
export function buildCandlestick(series: TimeSeries, request: DashboardRequest): CandlestickView {
  const { timezone } = request;
  const years = Array.from(new Set(series.map((bar) => yearOf(bar.timestamp, timezone)))).sort(
    (a, b) => a - b
  );

  const year = request.year ?? years[years.length - 1];
  if (year === undefined || !years.includes(year)) {
    throw new RangeEmptyError(`No closing prices for ${year ?? 'the selected year'}`, {
      view: 'candlestick',
      year,
      years,
    });
  }

  const { start, end } = yearBounds(year, timezone);
  const bars = filterRange(series, start, end);

  return {
    years,
    year,
    bars,
    summary: summarize(selectField(bars, 'close')),
  };
}
