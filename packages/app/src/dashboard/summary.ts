/**
 * Summary and evolution views: the selected metric resampled to the chosen
 * period.
 */

import { RangeEmptyError, type FieldSeries, type TimeSeries } from '@pricelens/contracts';
import { diffSign, resampleField, summarize } from '@pricelens/series-core';
import type { DashboardRequest } from './request.js';
import type { EvolutionView, SummaryView } from './types.js';

/**
 * Metric values per period: summed for volume, last value otherwise.
 *
 * @throws RangeEmptyError if no bucket has a value
 */
export function resampleMetric(
  series: TimeSeries,
  request: DashboardRequest,
  view: 'summary' | 'evolution'
): FieldSeries {
  const points = resampleField(series, request.metric, request.period, undefined, {
    timezone: request.timezone,
  });
  if (points.length === 0) {
    throw new RangeEmptyError('No data for the selected metric in this interval', {
      view,
      metric: request.metric,
      period: request.period,
    });
  }
  return points;
}

export function buildSummary(series: TimeSeries, request: DashboardRequest): SummaryView {
  const points = resampleMetric(series, request, 'summary');
  return {
    metric: request.metric,
    period: request.period,
    points: points.length,
    ...summarize(points),
  };
}

export function buildEvolution(series: TimeSeries, request: DashboardRequest): EvolutionView {
  const points = resampleMetric(series, request, 'evolution');
  const directions = diffSign(points);

  return {
    metric: request.metric,
    period: request.period,
    points: points.map((point, index) => ({
      timestamp: point.timestamp,
      value: point.value,
      direction: directions[index]?.value ?? 'flat',
    })),
  };
}
