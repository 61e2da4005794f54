/**
 * Dashboard assembly.
 *
 * Halting rules:
 * - invalid request → ConfigError thrown, nothing is computed
 * - empty dataset → LoadEmptyError thrown
 * - empty date range → RangeEmptyError thrown
 * - anything narrower only marks the affected view as empty or invalid
 */

import {
  LoadEmptyError,
  RangeEmptyError,
  isConfigError,
  isRangeEmptyError,
  type TimeSeries,
} from '@pricelens/contracts';
import { dateRange, filterRange, timeBounds } from '@pricelens/series-core';
import { measureSync, startTimer, type Logger } from '@pricelens/logger';
import { buildCandlestick } from './candlestick.js';
import { buildMonthlyReturns } from './monthly-returns.js';
import { buildMovingAverages } from './moving-averages.js';
import { buildPriceVolume } from './price-volume.js';
import { parseDashboardRequest, type DashboardRequest, type DashboardRequestInput } from './request.js';
import { buildEvolution, buildSummary } from './summary.js';
import type { Dashboard, ViewName, ViewOutcome } from './types.js';

/**
 * Builds every dashboard view for a loaded series.
 *
 * @throws ConfigError if the request is invalid
 * @throws LoadEmptyError if `series` has no rows
 * @throws RangeEmptyError if no row falls inside the requested dates
 *
 * @example
 * ```typescript
 * const dashboard = buildDashboard(series, { metric: 'close', period: 'month', start: '2021-01-01' });
 * if (dashboard.summary.status === 'ready') {
 *   console.log(dashboard.summary.data.changePct);
 * }
 * ```
 */
export function buildDashboard(
  series: TimeSeries,
  input: DashboardRequestInput = {},
  logger?: Logger
): Dashboard {
  const timer = startTimer();
  const request = parseDashboardRequest(input);
  const { start, end } = dateRange(request.start, request.end, request.timezone);

  if (series.length === 0) {
    throw new LoadEmptyError('The price series has no valid rows', { rowsRead: 0 });
  }

  const filtered = filterRange(series, start, end);
  const bounds = timeBounds(filtered);
  if (!bounds) {
    throw new RangeEmptyError('No data for the selected interval', {
      start: request.start,
      end: request.end,
    });
  }

  const run = <T>(view: ViewName, build: (s: TimeSeries, r: DashboardRequest) => T) =>
    runView(view, () => build(filtered, request), logger);

  const dashboard: Dashboard = {
    range: { ...bounds, rows: filtered.length },
    summary: run('summary', buildSummary),
    evolution: run('evolution', buildEvolution),
    candlestick: run('candlestick', buildCandlestick),
    monthlyReturns: run('monthlyReturns', buildMonthlyReturns),
    priceVolume: run('priceVolume', buildPriceVolume),
    movingAverages: run('movingAverages', buildMovingAverages),
  };

  logger?.info('Dashboard built', {
    component: 'dashboard',
    rows: filtered.length,
    period: request.period,
    duration_ms: timer.stop(),
  });

  return dashboard;
}

/**
 * Runs one view builder, turning per-view failures into outcomes. Any other
 * error propagates. Build time is logged at debug.
 */
export function runView<T>(view: ViewName, build: () => T, logger?: Logger): ViewOutcome<T> {
  try {
    const { result, duration_ms } = measureSync(build);
    logger?.debug('View built', { component: 'dashboard', view, duration_ms });
    return { status: 'ready', data: result };
  } catch (error) {
    if (isRangeEmptyError(error)) {
      logger?.warn(error.message, { component: 'dashboard', view });
      return { status: 'empty', error };
    }
    if (isConfigError(error)) {
      logger?.warn(error.message, { component: 'dashboard', view });
      return { status: 'invalid', error };
    }
    throw error;
  }
}
