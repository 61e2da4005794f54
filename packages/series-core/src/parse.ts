/**
 * Cell parsers for raw price rows.
 *
 * Both parsers are total: a cell that does not parse becomes `undefined`
 * (timestamps) or NaN (numbers), never an exception. Deciding what to do with
 * an unparsable row is the loader's job.
 */

import moment from 'moment-timezone';
import { DEFAULT_TIMEZONE } from './period.js';

/**
 * Accepted timestamp layouts, tried in strict mode.
 */
export const TIMESTAMP_FORMATS = [
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD HH:mm:ss.SSS',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DDTHH:mm:ss',
  'YYYY-MM-DDTHH:mm:ss.SSS',
  'YYYY-MM-DDTHH:mm:ssZ',
  'YYYY-MM-DDTHH:mm:ss.SSSZ',
  'YYYY-MM-DD',
];

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a timestamp cell into epoch milliseconds.
 *
 * Strings without an offset are read as wall-clock time in `timezone`; strings
 * with an offset (`Z`, `+02:00`) keep their own. Finite numbers are taken as
 * epoch milliseconds.
 *
 * @example
 * ```typescript
 * parseTimestamp('2017-08-17 00:00:00');      // Date.UTC(2017, 7, 17)
 * parseTimestamp('2017-08-17T03:00:00+03:00'); // Date.UTC(2017, 7, 17)
 * parseTimestamp('17/08/2017');               // undefined
 * ```
 */
export function parseTimestamp(
  value: unknown,
  timezone: string = DEFAULT_TIMEZONE
): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const text = value.trim();
  if (text === '') {
    return undefined;
  }

  const parsed = moment.tz(text, TIMESTAMP_FORMATS, true, timezone);
  return parsed.isValid() ? parsed.valueOf() : undefined;
}

/**
 * Parses a decimal cell. Blank, non-decimal or non-finite input → NaN.
 *
 * @example
 * ```typescript
 * parseNumber(' 4285.08 '); // 4285.08
 * parseNumber('1e3');       // 1000
 * parseNumber('n/a');       // NaN
 * parseNumber('');          // NaN
 * ```
 */
export function parseNumber(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : Number.NaN;
  }
  if (typeof value !== 'string') {
    return Number.NaN;
  }

  const text = value.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    return Number.NaN;
  }

  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}
