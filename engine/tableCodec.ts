// engine/tableCodec.ts
//
// Stored form of intermediate tables (cleaned sheets, lookup results).
// Rows are kept positional so column names never collide with JSON structure.

import { ErrorCodes } from './errorCodes';
import { ValidationError } from './errors';
import { createTable, rowFromEntries } from './table';
import type { CellValue, Table } from './types';

export const TABLE_CODEC_VERSION = 1;
export const TABLE_CONTENT_TYPE = 'application/json';

export interface StoredTable {
  version: typeof TABLE_CODEC_VERSION;
  columns: string[];
  rows: CellValue[][];
}

export function encodeTable(table: Table): Buffer {
  const stored: StoredTable = {
    version: TABLE_CODEC_VERSION,
    columns: [...table.columns],
    rows: table.rows.map((row) => table.columns.map((column) => row[column] ?? null))
  };
  return Buffer.from(JSON.stringify(stored), 'utf8');
}

function corrupt(identifier: string, reason: string, cause?: unknown): ValidationError {
  return new ValidationError(
    ErrorCodes.CORRUPT_STORED_TABLE,
    `Stored table "${identifier}" is corrupt: ${reason}`,
    { details: { identifier }, cause }
  );
}

function isCellValue(value: unknown): value is CellValue {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

export function decodeTable(bytes: Uint8Array, identifier: string): Table {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch (err) {
    throw corrupt(identifier, 'not valid JSON.', err);
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw corrupt(identifier, 'expected an object.');
  }
  if (!('version' in parsed) || parsed.version !== TABLE_CODEC_VERSION) {
    throw corrupt(identifier, 'unknown version.');
  }
  if (!('columns' in parsed) || !Array.isArray(parsed.columns)) {
    throw corrupt(identifier, 'missing columns.');
  }
  if (!('rows' in parsed) || !Array.isArray(parsed.rows)) {
    throw corrupt(identifier, 'missing rows.');
  }

  const columns: string[] = [];
  for (const column of parsed.columns) {
    if (typeof column !== 'string') throw corrupt(identifier, 'column names must be strings.');
    columns.push(column);
  }

  const rows = parsed.rows.map((cells: unknown, index: number) => {
    if (!Array.isArray(cells) || cells.length !== columns.length) {
      throw corrupt(identifier, `row ${index} does not match the columns.`);
    }
    return rowFromEntries(
      columns.map((column, i): [string, CellValue] => {
        const cell: unknown = cells[i];
        if (!isCellValue(cell)) throw corrupt(identifier, `row ${index} has an invalid cell.`);
        return [column, cell];
      })
    );
  });

  try {
    return createTable(columns, rows);
  } catch (err) {
    throw corrupt(identifier, 'table shape is invalid.', err);
  }
}
