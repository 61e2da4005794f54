/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import moment from 'moment-timezone';
import { Period, parsePeriod } from '@pricelens/contracts';

/**
 * Period name or alias (`M`, `monthly`, ...) normalized to a Period.
 */
export const periodSchema = z.string().transform((value, ctx): Period => {
  try {
    return parsePeriod(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

export const metricSchema = z.enum(['open', 'high', 'low', 'close', 'volume']);

export const timezoneSchema = z
  .string()
  .refine((value) => moment.tz.zone(value) !== null, (value) => ({
    message: `Unknown timezone: ${value}`,
  }));

const windowSchema = z.coerce.number().int().positive();

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  data: z
    .object({
      path: z.string().min(1).default('eth_1d_data_2017_to_2025.csv'),
      timezone: timezoneSchema.default('UTC'),
    })
    .default({}),

  dashboard: z
    .object({
      period: periodSchema.default(Period.Month),
      metric: metricSchema.default('close'),
      movingAverages: z
        .object({
          short: windowSchema.default(7),
          long: windowSchema.default(30),
        })
        .default({}),
      volumeMaWindow: windowSchema.default(30),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  PRICELENS_DATA_PATH: 'data.path',
  PRICELENS_TIMEZONE: 'data.timezone',
  PRICELENS_PERIOD: 'dashboard.period',
  PRICELENS_METRIC: 'dashboard.metric',
  PRICELENS_MA_SHORT: 'dashboard.movingAverages.short',
  PRICELENS_MA_LONG: 'dashboard.movingAverages.long',
  PRICELENS_VOLUME_MA: 'dashboard.volumeMaWindow',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
};
