/**
 * Calendar period utilities.
 *
 * This module provides functions for:
 * - Validating timezone names
 * - Snapping timestamps to the start of their day, month or year
 * - Labelling a period by its last calendar day
 * - Turning calendar dates into inclusive millisecond bounds
 *
 * Unlike fixed-length timeframes, months and years have variable length, so
 * boundaries are computed on the calendar in a named timezone (UTC unless
 * configured otherwise) rather than by integer division.
 */

import moment from 'moment-timezone';
import { ConfigError, Period } from '@pricelens/contracts';

/**
 * Timezone used when none is configured.
 */
export const DEFAULT_TIMEZONE = 'UTC';

/**
 * moment unit for each period.
 */
const PERIOD_UNITS: Record<Period, moment.unitOfTime.StartOf> = {
  [Period.Day]: 'day',
  [Period.Month]: 'month',
  [Period.Year]: 'year',
};

/**
 * Throws ConfigError unless `timezone` is a known IANA zone name.
 *
 * @example
 * ```typescript
 * assertTimezone('UTC');              // ok
 * assertTimezone('America/Sao_Paulo'); // ok
 * assertTimezone('Mars/Olympus');      // throws ConfigError
 * ```
 */
export function assertTimezone(timezone: string): void {
  if (moment.tz.zone(timezone) === null) {
    throw new ConfigError(`Unknown timezone: ${timezone}`, {
      parameter: 'timezone',
      value: timezone,
    });
  }
}

/**
 * Returns the start of the calendar period containing `timestamp`.
 *
 * @param timestamp - Unix epoch milliseconds
 * @param period - Calendar period to snap to
 * @param timezone - IANA zone the calendar is read in
 * @returns Epoch milliseconds of the period start
 *
 * @example
 * ```typescript
 * const ts = Date.UTC(2021, 5, 15, 13, 30); // 2021-06-15T13:30Z
 *
 * periodStart(ts, Period.Day);   // Date.UTC(2021, 5, 15)
 * periodStart(ts, Period.Month); // Date.UTC(2021, 5, 1)
 * periodStart(ts, Period.Year);  // Date.UTC(2021, 0, 1)
 * ```
 */
export function periodStart(
  timestamp: number,
  period: Period,
  timezone: string = DEFAULT_TIMEZONE
): number {
  return moment.tz(timestamp, timezone).startOf(PERIOD_UNITS[period]).valueOf();
}

/**
 * Label of the period containing `timestamp`: midnight of the period's last
 * day (the day itself, the last day of the month, December 31).
 *
 * @example
 * ```typescript
 * const ts = Date.UTC(2021, 5, 15, 13, 30);
 *
 * periodLabel(ts, Period.Day);   // Date.UTC(2021, 5, 15)
 * periodLabel(ts, Period.Month); // Date.UTC(2021, 5, 30)
 * periodLabel(ts, Period.Year);  // Date.UTC(2021, 11, 31)
 * ```
 */
export function periodLabel(
  timestamp: number,
  period: Period,
  timezone: string = DEFAULT_TIMEZONE
): number {
  return moment.tz(timestamp, timezone).endOf(PERIOD_UNITS[period]).startOf('day').valueOf();
}

/**
 * Calendar year of `timestamp` in `timezone`.
 */
export function yearOf(timestamp: number, timezone: string = DEFAULT_TIMEZONE): number {
  return moment.tz(timestamp, timezone).year();
}

/**
 * Inclusive millisecond bounds of a calendar year.
 */
export function yearBounds(
  year: number,
  timezone: string = DEFAULT_TIMEZONE
): { start: number; end: number } {
  const start = moment.tz({ year, month: 0, day: 1 }, timezone);
  return {
    start: start.valueOf(),
    end: start.clone().endOf('year').valueOf(),
  };
}

/**
 * Converts calendar dates (`YYYY-MM-DD`) into inclusive epoch bounds:
 * `start` at the first millisecond of its day, `end` at the last millisecond
 * of its day. Omitted bounds stay undefined.
 *
 * @throws ConfigError if a date does not parse, or start is after end
 *
 * @example
 * ```typescript
 * dateRange('2021-01-01', '2021-01-31');
 * // { start: Date.UTC(2021, 0, 1), end: Date.UTC(2021, 0, 31, 23, 59, 59, 999) }
 * ```
 */
export function dateRange(
  startDate: string | undefined,
  endDate: string | undefined,
  timezone: string = DEFAULT_TIMEZONE
): { start: number | undefined; end: number | undefined } {
  const start = startDate === undefined ? undefined : parseDate(startDate, 'start', timezone);
  const end = endDate === undefined ? undefined : parseDate(endDate, 'end', timezone);

  if (start !== undefined && end !== undefined && start > end) {
    throw new ConfigError(`Start date ${startDate} is after end date ${endDate}`, {
      parameter: 'range',
      value: { start: startDate, end: endDate },
    });
  }

  return { start, end };
}

function parseDate(text: string, bound: 'start' | 'end', timezone: string): number {
  const parsed = moment.tz(text, 'YYYY-MM-DD', true, timezone);
  if (!parsed.isValid()) {
    throw new ConfigError(`Invalid ${bound} date: ${text} (expected YYYY-MM-DD)`, {
      parameter: bound,
      value: text,
    });
  }
  return bound === 'start' ? parsed.startOf('day').valueOf() : parsed.endOf('day').valueOf();
}
