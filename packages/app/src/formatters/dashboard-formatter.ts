/**
 * Dashboard report formatter
 * Renders a built dashboard as a text report or a JSON snapshot
 */

import chalk from 'chalk';
import moment from 'moment-timezone';
import { Period, getPeriodLabel, type PriceField } from '@pricelens/contracts';
import type { Dashboard, ViewOutcome } from '../dashboard/index.js';

export type OutputFormat = 'text' | 'json';

/**
 * Display label of each metric.
 */
export const FIELD_LABELS: Readonly<Record<PriceField, string>> = {
  close: 'Closing price',
  open: 'Opening price',
  high: 'Period high',
  low: 'Period low',
  volume: 'Traded volume',
};

const PERIOD_DATE_FORMATS: Readonly<Record<Period, string>> = {
  [Period.Day]: 'YYYY-MM-DD',
  [Period.Month]: 'YYYY-MM',
  [Period.Year]: 'YYYY',
};

const twoDecimals = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const noDecimals = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * `US$ 1,234.56`
 */
export function formatMoney(value: number): string {
  return `US$ ${twoDecimals.format(value)}`;
}

/**
 * `1,234,568`
 */
export function formatVolume(value: number): string {
  return noDecimals.format(value);
}

/**
 * Money for prices, a plain count for volume.
 */
export function formatMetricValue(field: PriceField, value: number): string {
  return field === 'volume' ? formatVolume(value) : formatMoney(value);
}

/**
 * `12.35%`; `n/a` when absent.
 */
export function formatPercent(value: number | undefined): string {
  return value === undefined ? 'n/a' : `${twoDecimals.format(value)}%`;
}

/**
 * Bucket label at the resolution of `period`.
 */
export function formatPeriodDate(timestamp: number, period: Period, timezone = 'UTC'): string {
  return moment.tz(timestamp, timezone).format(PERIOD_DATE_FORMATS[period]);
}

export interface DashboardFormatterOptions {
  /** Colorize the text report. @default false */
  color?: boolean;
  /** Zone used to print dates. @default 'UTC' */
  timezone?: string;
}

/**
 * Formatter for dashboard reports
 */
export class DashboardFormatter {
  private readonly color: boolean;
  private readonly timezone: string;

  constructor(options: DashboardFormatterOptions = {}) {
    this.color = options.color ?? false;
    this.timezone = options.timezone ?? 'UTC';
  }

  /**
   * Format dashboard in specified format
   */
  format(dashboard: Dashboard, format: OutputFormat = 'text'): string {
    return format === 'json' ? this.formatAsJSON(dashboard) : this.formatAsText(dashboard);
  }

  /**
   * JSON snapshot. View errors are reduced to code, message and data.
   */
  private formatAsJSON(dashboard: Dashboard): string {
    const view = <T>(outcome: ViewOutcome<T>): unknown =>
      outcome.status === 'ready'
        ? outcome
        : {
            status: outcome.status,
            error: {
              code: outcome.error.code,
              message: outcome.error.message,
              data: outcome.error.data,
            },
          };

    return JSON.stringify(
      {
        range: dashboard.range,
        summary: view(dashboard.summary),
        evolution: view(dashboard.evolution),
        candlestick: view(dashboard.candlestick),
        monthlyReturns: view(dashboard.monthlyReturns),
        priceVolume: view(dashboard.priceVolume),
        movingAverages: view(dashboard.movingAverages),
      },
      null,
      2
    );
  }

  /**
   * Format as plain text (default)
   */
  private formatAsText(dashboard: Dashboard): string {
    const lines: string[] = [];
    const day = (timestamp: number) => formatPeriodDate(timestamp, Period.Day, this.timezone);

    lines.push(
      this.bold(`PriceLens: ${day(dashboard.range.start)} to ${day(dashboard.range.end)}`)
    );
    lines.push('='.repeat(50));
    lines.push(`  Days: ${dashboard.range.rows}`);
    lines.push('');

    const { summary } = dashboard;
    if (summary.status === 'ready') {
      const { metric, period } = summary.data;
      lines.push(this.bold(`${FIELD_LABELS[metric]} (${getPeriodLabel(period)})`));
      lines.push(`  Start: ${formatMetricValue(metric, summary.data.first)}`);
      lines.push(`  End: ${formatMetricValue(metric, summary.data.last)}`);
      lines.push(`  Change: ${this.signed(summary.data.changePct)}`);
    } else {
      lines.push(this.bold('Summary'));
      lines.push(this.notice(summary.error.message));
    }
    lines.push('');

    const { candlestick } = dashboard;
    if (candlestick.status === 'ready') {
      const { year, summary: yearSummary, bars } = candlestick.data;
      lines.push(this.bold(`Year ${year}`));
      lines.push(`  Close (start of year): ${formatMoney(yearSummary.first)}`);
      lines.push(`  Close (end of year): ${formatMoney(yearSummary.last)}`);
      lines.push(`  Change in year: ${this.signed(yearSummary.changePct)}`);
      lines.push(`  Days: ${bars.length}`);
    } else {
      lines.push(this.bold('Year'));
      lines.push(this.notice(candlestick.error.message));
    }
    lines.push('');

    const { monthlyReturns } = dashboard;
    lines.push(this.bold('Monthly return'));
    if (monthlyReturns.status === 'ready') {
      const last = monthlyReturns.data.points[monthlyReturns.data.points.length - 1];
      if (last) {
        const month = formatPeriodDate(last.timestamp, Period.Month, this.timezone);
        lines.push(`  ${month}: ${this.signed(last.returnPct)}`);
      }
    } else {
      lines.push(this.notice(monthlyReturns.error.message));
    }
    lines.push('');

    const { movingAverages } = dashboard;
    if (movingAverages.status === 'ready') {
      const { short, long, crossovers } = movingAverages.data;
      lines.push(this.bold(`Moving averages (${short}d / ${long}d)`));
      lines.push(`  Bullish crossovers: ${crossovers.up.length}`);
      lines.push(`  Bearish crossovers: ${crossovers.down.length}`);
      const latest = [...crossovers.up, ...crossovers.down].sort((a, b) => b.index - a.index)[0];
      if (latest) {
        const kind = crossovers.up.includes(latest) ? 'bullish' : 'bearish';
        lines.push(`  Latest: ${kind} on ${day(latest.timestamp)} at ${formatMoney(latest.value)}`);
      }
    } else {
      lines.push(this.bold('Moving averages'));
      lines.push(this.notice(movingAverages.error.message));
    }

    return lines.join('\n');
  }

  private signed(value: number | undefined): string {
    const text = formatPercent(value);
    if (!this.color || value === undefined) return text;
    if (value > 0) return chalk.green(text);
    if (value < 0) return chalk.red(text);
    return text;
  }

  private bold(text: string): string {
    return this.color ? chalk.bold(text) : text;
  }

  private notice(text: string): string {
    const line = `  ${text}`;
    return this.color ? chalk.yellow(line) : line;
  }
}
