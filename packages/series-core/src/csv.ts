/**
 * Price file reading.
 *
 * Reads a CSV with a header row into raw records keyed by column name. Cell
 * text is returned untouched apart from trimming; typing and cleaning happen
 * in load().
 */

import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { LoadError, type RawRow } from '@pricelens/contracts';

/**
 * Parses CSV text with a header row.
 *
 * @param content - CSV text
 * @param source - Name used in error payloads
 * @throws LoadError on malformed CSV (e.g. a row with the wrong number of cells)
 *
 * @example
 * ```typescript
 * parsePriceCsv('Open time,Open,High,Low,Close,Volume\n2021-01-01 00:00:00,737,749,714,730,980\n');
 * // [{ 'Open time': '2021-01-01 00:00:00', Open: '737', High: '749', Low: '714', Close: '730', Volume: '980' }]
 * ```
 */
export function parsePriceCsv(content: string, source?: string): RawRow[] {
  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    throw new LoadError(`Malformed CSV${source ? ` in ${source}` : ''}`, {
      source,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (!Array.isArray(records) || !records.every(isRawRow)) {
    throw new LoadError(`Unexpected CSV structure${source ? ` in ${source}` : ''}`, { source });
  }

  return records;
}

/**
 * Reads and parses a CSV price file.
 *
 * @throws LoadError if the file cannot be read or is not valid CSV
 */
export function readPriceCsv(filePath: string): RawRow[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new LoadError(`Cannot read price file: ${filePath}`, {
      source: filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return parsePriceCsv(content, filePath);
}

function isRawRow(value: unknown): value is RawRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === 'string')
  );
}
