/**
 * Configuration loading and management
 */

import { ConfigError } from '@pricelens/contracts';
import type { Logger } from '@pricelens/logger';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = { [key: string]: string | RawConfig };

/**
 * Load configuration from environment and defaults
 *
 * @throws ConfigError listing every invalid setting
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      parameter: 'environment',
      issues,
    });
  }

  logger?.debug('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: string): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    dataset: config.data.path,
    timezone: config.data.timezone,
    period: config.dashboard.period,
    metric: config.dashboard.metric,
    movingAverages: `${config.dashboard.movingAverages.short}/${config.dashboard.movingAverages.long}`,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? 'none',
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping, periodSchema, metricSchema, timezoneSchema } from './schema.js';
