/**
 * @fileoverview Custom Winston formats for the PriceLens logger.
 */

import { format } from 'winston';

/**
 * Fields printed first, in this order, by {@link prettyPrint}.
 */
const CONTEXT_FIELDS = ['component', 'dataset', 'view', 'period'] as const;

/**
 * Winston fields never repeated in the pretty context string.
 */
const INTERNAL_FIELDS = ['level', 'message', 'timestamp', 'stack', 'splat'];

/**
 * Adds an ISO 8601 timestamp and expands Error objects with their stack.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders an info object as one human-readable line.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Dataset loaded component=series-loader dataset=eth.csv rows=2950
 * ```
 */
export function renderLine(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const key of CONTEXT_FIELDS) {
    const value = info[key];
    if (value !== undefined && value !== '') {
      context.push(`${key}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (INTERNAL_FIELDS.includes(key) || CONTEXT_FIELDS.some((field) => field === key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  const stack = info['stack'];
  if (typeof stack === 'string') {
    return `${baseMsg}\n${stack}`;
  }

  return baseMsg;
}

/**
 * Winston format for human-readable, colorized output (development).
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderLine(info))
);
