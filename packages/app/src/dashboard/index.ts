export { buildDashboard, runView } from './build.js';
export { parseDashboardRequest, dashboardRequestSchema } from './request.js';
export type { DashboardRequest, DashboardRequestInput } from './request.js';
export { buildSummary, buildEvolution, resampleMetric } from './summary.js';
export { buildCandlestick } from './candlestick.js';
export { buildMonthlyReturns } from './monthly-returns.js';
export { buildPriceVolume } from './price-volume.js';
export {
  buildMovingAverages,
  validateWindows,
  SHORT_WINDOW_LIMITS,
  LONG_WINDOW_LIMITS,
} from './moving-averages.js';
export type {
  ViewOutcome,
  ViewName,
  Dashboard,
  SummaryView,
  EvolutionPoint,
  EvolutionView,
  CandlestickView,
  MonthlyReturnPoint,
  MonthlyReturnsView,
  PriceVolumePoint,
  PriceVolumeView,
  MovingAveragePoint,
  CrossoverPoint,
  MovingAveragesView,
} from './types.js';
