/**
 * Delimited-Text Reader
 *
 * Loads CSV/TSV into a TabularRecordSet. The header row is the schema.
 *
 * CELL CONVERSION:
 * - Empty, whitespace-only or a missing-value marker (NA, N/A, NaN, null, ...) → null
 * - Anything else → string, untouched
 *
 * Numeric text is left as text; coordinates and aggregate values are parsed
 * where they are used, and join keys such as `004` keep their exact form.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { csvParse, tsvParse, type DSVRowArray } from 'd3-dsv';
import { TabularReadError } from '../core/errors.js';
import type { ScalarValue, TabularRecord, TabularRecordSet } from '../core/types.js';

export type DelimitedFormat = 'csv' | 'tsv';

/** Cell texts read as missing, compared after trimming */
export const MISSING_VALUE_MARKERS: ReadonlySet<string> = new Set([
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

/**
 * Convert one raw cell
 */
export function convertCell(raw: string | undefined): ScalarValue {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (trimmed === '' || MISSING_VALUE_MARKERS.has(trimmed)) return null;
  return raw;
}

/**
 * Pick a format from a file extension (.tsv/.tab → tsv, otherwise csv)
 */
export function detectFormat(filePath: string): DelimitedFormat {
  const ext = extname(filePath).toLowerCase();
  return ext === '.tsv' || ext === '.tab' ? 'tsv' : 'csv';
}

/**
 * Parse delimited text held in memory
 *
 * @throws TabularReadError when there is no header row
 */
export function parseDelimited(
  text: string,
  format: DelimitedFormat = 'csv',
  source?: string
): TabularRecordSet {
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: DSVRowArray<string> = format === 'tsv' ? tsvParse(body) : csvParse(body);
  const schema: readonly string[] = rows.columns;

  if (schema.length === 0 || (schema.length === 1 && schema[0] === '')) {
    throw new TabularReadError('No header row', source);
  }

  const records: TabularRecord[] = rows.map((row) => {
    const record: Record<string, ScalarValue> = {};
    for (const column of schema) {
      record[column] = convertCell(row[column]);
    }
    return record;
  });

  return { schema, records };
}

/**
 * Read a CSV/TSV file
 *
 * @throws TabularReadError when the file is empty or has no header
 */
export async function readTabularFile(
  filePath: string,
  format: DelimitedFormat = detectFormat(filePath)
): Promise<TabularRecordSet> {
  const content = await readFile(filePath, 'utf-8');
  if (content.trim() === '') {
    throw new TabularReadError('Empty file', filePath);
  }
  return parseDelimited(content, format, filePath);
}
