/**
 * Monthly return bars.
 */

import { Period, RangeEmptyError, type TimeSeries } from '@pricelens/contracts';
import { percentChange, resampleField } from '@pricelens/series-core';
import type { DashboardRequest } from './request.js';
import type { MonthlyReturnsView } from './types.js';

/**
 * Percent change between consecutive month-end closes.
 *
 * @throws RangeEmptyError when fewer than two months have a close
 */
export function buildMonthlyReturns(
  series: TimeSeries,
  request: DashboardRequest
): MonthlyReturnsView {
  const closes = resampleField(series, 'close', Period.Month, 'last', {
    timezone: request.timezone,
  });
  const returns = percentChange(closes);

  if (!returns.some((point) => point.value !== undefined)) {
    throw new RangeEmptyError('Not enough data to compute monthly returns', {
      view: 'monthlyReturns',
      months: closes.length,
    });
  }

  return {
    points: closes.map((point, index) => {
      const returnPct = returns[index]?.value;
      return {
        timestamp: point.timestamp,
        close: point.value,
        returnPct,
        direction: returnPct !== undefined && returnPct > 0 ? 'up' : 'down',
      };
    }),
  };
}
