/**
 * Tests for CSV reading and the memoized SeriesLoader
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigError, LoadError, type RawRow } from '@pricelens/contracts';
import { parsePriceCsv, readPriceCsv } from '../src/csv.js';
import { SeriesLoader } from '../src/loader.js';
import { rawRow, utc } from './fixtures.js';

const HEADER = 'Open time,Open,High,Low,Close,Volume';

describe('parsePriceCsv', () => {
  it('should key cells by header and trim them', () => {
    const rows = parsePriceCsv(`${HEADER}\n2021-01-01 00:00:00, 737.1 ,749,714,730,980\n`);

    expect(rows).toEqual([
      {
        'Open time': '2021-01-01 00:00:00',
        Open: '737.1',
        High: '749',
        Low: '714',
        Close: '730',
        Volume: '980',
      },
    ]);
  });

  it('should skip empty lines and a byte order mark', () => {
    const rows = parsePriceCsv(`\uFEFF${HEADER}\n\n2021-01-01,1,1,1,1,1\n\n`);

    expect(rows).toHaveLength(1);
    expect(rows[0]?.['Open time']).toBe('2021-01-01');
  });

  it('should return no rows for a header-only file', () => {
    expect(parsePriceCsv(`${HEADER}\n`)).toEqual([]);
  });

  it('should throw LoadError for rows with the wrong number of cells', () => {
    expect(() => parsePriceCsv(`${HEADER}\n2021-01-01,1,1\n`, 'bad.csv')).toThrow(
      'Malformed CSV in bad.csv'
    );
  });
});

describe('readPriceCsv and SeriesLoader', () => {
  let tmpDir: string;
  let csvPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pricelens-csv-'));
    csvPath = path.join(tmpDir, 'prices.csv');
    fs.writeFileSync(
      csvPath,
      [
        HEADER,
        '2021-01-02 00:00:00,730,790,715,775,1200',
        '2021-01-01 00:00:00,737,749,714,730,980',
        'oops,1,1,1,1,1',
      ].join('\n')
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should read a file from disk', () => {
    expect(readPriceCsv(csvPath)).toHaveLength(3);
  });

  it('should throw LoadError for a missing file', () => {
    const missing = path.join(tmpDir, 'missing.csv');

    expect(() => readPriceCsv(missing)).toThrow(LoadError);
    expect(() => readPriceCsv(missing)).toThrow(`Cannot read price file: ${missing}`);
  });

  it('should load, clean and sort the file', () => {
    const loader = new SeriesLoader();
    const series = loader.get(csvPath);

    expect(series.map((b) => [b.timestamp, b.close])).toEqual([
      [utc(2021, 1, 1), 730],
      [utc(2021, 1, 2), 775],
    ]);
    expect(loader.getWithStats(csvPath)).toMatchObject({ rowsRead: 3, rowsDropped: 1 });
  });

  it('should memoize by resolved path', () => {
    const readRows = vi.fn((filePath: string): RawRow[] => readPriceCsv(filePath));
    const loader = new SeriesLoader({ readRows });

    const first = loader.get(csvPath);
    const relative = path.relative(process.cwd(), csvPath);
    const second = loader.get(relative);

    expect(second).toBe(first);
    expect(readRows).toHaveBeenCalledTimes(1);
    expect(loader.size).toBe(1);
  });

  it('should reload after invalidate', () => {
    const readRows = vi.fn((): RawRow[] => [rawRow('2021-01-01', '1')]);
    const loader = new SeriesLoader({ readRows });

    loader.get('a.csv');
    loader.get('b.csv');
    expect(loader.invalidate('a.csv')).toBe(true);
    expect(loader.invalidate('a.csv')).toBe(false);
    loader.get('a.csv');

    expect(readRows).toHaveBeenCalledTimes(3);
    expect(loader.invalidate()).toBe(true);
    expect(loader.size).toBe(0);
    expect(loader.invalidate()).toBe(false);
  });

  it('should cache an empty load as well', () => {
    const readRows = vi.fn((): RawRow[] => [rawRow('bad', '1')]);
    const loader = new SeriesLoader({ readRows });

    expect(loader.get('empty.csv')).toEqual([]);
    expect(loader.get('empty.csv')).toEqual([]);
    expect(readRows).toHaveBeenCalledTimes(1);
  });

  it('should reject an unknown timezone', () => {
    expect(() => new SeriesLoader({ timezone: 'Nowhere/City' })).toThrow(ConfigError);
  });
});
