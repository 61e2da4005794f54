/**
 * Dashboard request validation.
 */

import { z } from 'zod';
import { ConfigError, Period } from '@pricelens/contracts';
import { metricSchema, periodSchema, timezoneSchema } from '../config/schema.js';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const dateSchema = z.string().regex(DATE_PATTERN, 'Expected a date as YYYY-MM-DD');

export const dashboardRequestSchema = z.object({
  metric: z.string().pipe(metricSchema).default('close'),
  period: periodSchema.default(Period.Month),
  start: dateSchema.optional(),
  end: dateSchema.optional(),
  year: z.number().int().optional(),
  timezone: timezoneSchema.default('UTC'),
  movingAverages: z
    .object({
      short: z.number().int().default(7),
      long: z.number().int().default(30),
    })
    .default({}),
  volumeMaWindow: z.number().int().min(1).default(30),
});

/**
 * Request as accepted from callers; every field has a default.
 */
export type DashboardRequestInput = z.input<typeof dashboardRequestSchema>;

/**
 * Request after defaults and normalization.
 */
export type DashboardRequest = z.output<typeof dashboardRequestSchema>;

/**
 * Validates a request. Moving-average window bounds are checked by the view
 * itself so a bad pair only invalidates that chart.
 *
 * @throws ConfigError listing every invalid field
 *
 * @example
 * ```typescript
 * parseDashboardRequest({ metric: 'volume', period: 'Y' });
 * // { metric: 'volume', period: Period.Year, timezone: 'UTC', movingAverages: { short: 7, long: 30 }, volumeMaWindow: 30 }
 * ```
 */
export function parseDashboardRequest(input: DashboardRequestInput = {}): DashboardRequest {
  const result = dashboardRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid dashboard request:\n${issues.join('\n')}`, {
      parameter: 'request',
      issues,
    });
  }
  return result.data;
}
