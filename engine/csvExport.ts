// engine/csvExport.ts
// Table → CSV bytes (UTF-8, comma separated, header row first).

import { stringify } from 'csv-stringify/sync';
import type { Table } from './types';

export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

/**
 * Rows are written as arrays so header names are never read as property paths.
 * Values containing the delimiter, a quote or a line break are quoted; quotes are doubled.
 */
export function encodeTableAsCsv(table: Table): Buffer {
  const records = [
    [...table.columns],
    ...table.rows.map((row) => table.columns.map((column) => row[column] ?? null))
  ];
  return Buffer.from(stringify(records), 'utf8');
}
