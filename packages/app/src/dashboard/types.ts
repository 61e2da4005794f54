/**
 * Dashboard view types.
 *
 * Every view is plain data: timestamps in epoch ms, values as numbers, absent
 * points as `undefined`. Rendering belongs to the caller.
 */

import type {
  ConfigError,
  Direction,
  Period,
  PriceBar,
  PriceField,
  RangeEmptyError,
  RangeSummary,
} from '@pricelens/contracts';

/**
 * Result of building one view. A view that cannot be built never takes the
 * other views down with it.
 */
export type ViewOutcome<T> =
  | { status: 'ready'; data: T }
  | { status: 'empty'; error: RangeEmptyError }
  | { status: 'invalid'; error: ConfigError };

export type ViewName =
  | 'summary'
  | 'evolution'
  | 'candlestick'
  | 'monthlyReturns'
  | 'priceVolume'
  | 'movingAverages';

/**
 * First/last value of the selected metric over the filtered range.
 */
export interface SummaryView extends RangeSummary {
  metric: PriceField;
  period: Period;
  /** Number of resampled points the summary spans. */
  points: number;
}

export interface EvolutionPoint {
  timestamp: number;
  value: number;
  /** Change versus the previous point; `flat` for the first. */
  direction: Direction;
}

export interface EvolutionView {
  metric: PriceField;
  period: Period;
  points: EvolutionPoint[];
}

export interface CandlestickView {
  /** Calendar years present in the filtered range, ascending. */
  years: number[];
  year: number;
  bars: PriceBar[];
  /** Closing-price summary of the selected year. */
  summary: RangeSummary;
}

export interface MonthlyReturnPoint {
  /** Last day of the month. */
  timestamp: number;
  close: number;
  /** Percent change versus the previous month-end close. */
  returnPct: number | undefined;
  /** `up` for a positive return, `down` otherwise (including the first month). */
  direction: 'up' | 'down';
}

export interface MonthlyReturnsView {
  points: MonthlyReturnPoint[];
}

export interface PriceVolumePoint {
  timestamp: number;
  close: number;
  volume: number | undefined;
  /** Volume minus the previous day's volume. */
  volumeDelta: number | undefined;
  volumeDirection: Direction;
  /** Trailing mean of volume. */
  volumeMean: number | undefined;
}

export interface PriceVolumeView {
  volumeMaWindow: number;
  points: PriceVolumePoint[];
}

export interface MovingAveragePoint {
  timestamp: number;
  close: number;
  short: number | undefined;
  long: number | undefined;
}

export interface CrossoverPoint {
  index: number;
  timestamp: number;
  /** Short average at the crossing. */
  value: number;
}

export interface MovingAveragesView {
  short: number;
  long: number;
  points: MovingAveragePoint[];
  crossovers: {
    up: CrossoverPoint[];
    down: CrossoverPoint[];
  };
}

/**
 * The complete dashboard for one dataset and request.
 */
export interface Dashboard {
  range: {
    start: number;
    end: number;
    rows: number;
  };
  summary: ViewOutcome<SummaryView>;
  evolution: ViewOutcome<EvolutionView>;
  candlestick: ViewOutcome<CandlestickView>;
  monthlyReturns: ViewOutcome<MonthlyReturnsView>;
  priceVolume: ViewOutcome<PriceVolumeView>;
  movingAverages: ViewOutcome<MovingAveragesView>;
}
