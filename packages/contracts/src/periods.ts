/**
 * @fileoverview Calendar resample periods.
 *
 * @module @pricelens/contracts/periods
 */

/**
 * Calendar periods a series can be resampled to.
 *
 * @invariant Ordered from shortest to longest
 */
export enum Period {
  Day = 'day',
  Month = 'month',
  Year = 'year',
}

const PERIOD_LABELS: Record<Period, string> = {
  [Period.Day]: 'Daily',
  [Period.Month]: 'Monthly',
  [Period.Year]: 'Yearly',
};

/**
 * Alternate spellings accepted by {@link parsePeriod}.
 */
const PERIOD_ALIASES: Record<string, Period> = {
  D: Period.Day,
  d: Period.Day,
  daily: Period.Day,
  M: Period.Month,
  monthly: Period.Month,
  Y: Period.Year,
  y: Period.Year,
  yearly: Period.Year,
  annual: Period.Year,
};

/**
 * Validates whether a string is a canonical Period value.
 *
 * @example
 * ```typescript
 * isValidPeriod('month')  // true
 * isValidPeriod('M')      // false (alias, see parsePeriod)
 * ```
 */
export function isValidPeriod(value: string): value is Period {
  return Object.values(Period).some((period) => period === value);
}

/**
 * Gets the human-readable label for a period.
 */
export function getPeriodLabel(period: Period): string {
  return PERIOD_LABELS[period];
}

/**
 * Parses a period name or alias, throwing if unknown.
 *
 * @throws {Error} If value is neither a period nor a known alias
 *
 * @example
 * ```typescript
 * parsePeriod('year')  // Period.Year
 * parsePeriod('M')     // Period.Month
 * parsePeriod('week')  // throws
 * ```
 */
export function parsePeriod(value: string): Period {
  if (isValidPeriod(value)) {
    return value;
  }
  const alias = PERIOD_ALIASES[value];
  if (alias !== undefined) {
    return alias;
  }
  throw new Error(
    `Invalid period: ${value}. Must be one of: ${Object.values(Period).join(', ')}`
  );
}
