/**
 * Memoized dataset loader.
 *
 * Parsing a multi-year daily file is the only non-trivial cost in the
 * pipeline, so loaded series are kept per resolved file path for the life of
 * the loader. Files are treated as immutable: nothing is watched, and callers
 * drop entries explicitly with invalidate().
 */

import path from 'node:path';
import type { RawRow, TimeSeries } from '@pricelens/contracts';
import { startTimer, type Logger } from '@pricelens/logger';
import { readPriceCsv } from './csv.js';
import { loadWithStats, type LoadResult } from './load.js';
import { DEFAULT_TIMEZONE, assertTimezone } from './period.js';

/**
 * Options for SeriesLoader.
 */
export interface SeriesLoaderOptions {
  /** Zone for timestamps without an offset. @default 'UTC' */
  timezone?: string;

  logger?: Logger;

  /** Row source, replaceable in tests. @default readPriceCsv */
  readRows?: (filePath: string) => RawRow[];
}

/**
 * Caches `load(readPriceCsv(path))` by resolved path.
 *
 * @example
 * ```typescript
 * const loader = new SeriesLoader({ logger });
 * const series = loader.get('data/eth_1d.csv'); // parses the file
 * loader.get('./data/eth_1d.csv');              // cache hit, same array
 * loader.invalidate('data/eth_1d.csv');         // next get() re-reads
 * ```
 */
export class SeriesLoader {
  private readonly cache = new Map<string, LoadResult>();
  private readonly timezone: string;
  private readonly logger?: Logger;
  private readonly readRows: (filePath: string) => RawRow[];

  constructor(options: SeriesLoaderOptions = {}) {
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
    assertTimezone(this.timezone);
    this.logger = options.logger;
    this.readRows = options.readRows ?? readPriceCsv;
  }

  /**
   * Returns the cleaned series for `filePath`, loading it on first use.
   *
   * @throws LoadError if the file is unreadable or lacks required columns
   */
  get(filePath: string): TimeSeries {
    return this.getWithStats(filePath).series;
  }

  /**
   * Same as {@link get}, with the row accounting of the first load.
   */
  getWithStats(filePath: string): LoadResult {
    const key = path.resolve(filePath);
    const cached = this.cache.get(key);
    if (cached) {
      this.logger?.debug('Series cache hit', { dataset: key });
      return cached;
    }

    this.logger?.debug('Series cache miss', { dataset: key });
    const timer = startTimer();
    const result = loadWithStats(this.readRows(key), {
      timezone: this.timezone,
      source: key,
      logger: this.logger,
    });

    this.cache.set(key, result);
    this.logger?.info('Dataset loaded', {
      dataset: key,
      rows: result.series.length,
      rows_dropped: result.rowsDropped,
      duration_ms: timer.stop(),
    });

    return result;
  }

  /**
   * Drops one cached path, or every entry when called without arguments.
   *
   * @returns true if anything was removed
   */
  invalidate(filePath?: string): boolean {
    if (filePath === undefined) {
      const removed = this.cache.size > 0;
      this.cache.clear();
      return removed;
    }
    return this.cache.delete(path.resolve(filePath));
  }

  /** Number of cached datasets. */
  get size(): number {
    return this.cache.size;
  }
}
