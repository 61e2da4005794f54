/**
 * Price and volume overlay.
 */

import type { TimeSeries } from '@pricelens/contracts';
import { difference, diffSign, rollingMean, selectField } from '@pricelens/series-core';
import type { DashboardRequest } from './request.js';
import type { PriceVolumeView } from './types.js';

export function buildPriceVolume(series: TimeSeries, request: DashboardRequest): PriceVolumeView {
  const { volumeMaWindow } = request;
  const volumes = selectField(series, 'volume');
  const deltas = difference(volumes);
  const directions = diffSign(volumes);
  const means = rollingMean(volumes, volumeMaWindow);

  return {
    volumeMaWindow,
    points: series.map((bar, index) => ({
      timestamp: bar.timestamp,
      close: bar.close,
      volume: Number.isFinite(bar.volume) ? bar.volume : undefined,
      volumeDelta: deltas[index]?.value,
      volumeDirection: directions[index]?.value ?? 'flat',
      volumeMean: means[index]?.value,
    })),
  };
}
