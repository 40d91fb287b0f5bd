// engine/table.ts
// Schema-flexible table helpers. Every operation boundary checks columns explicitly.

import { ErrorCodes } from './errorCodes';
import { ValidationError } from './errors';
import type { CellValue, Row, Table } from './types';

/**
 * Build a table and enforce its invariants:
 *  - column names are unique
 *  - every row carries exactly the declared columns
 *
 * Rows are copied; callers may keep mutating their own objects afterwards.
 */
export function createTable(
  columns: readonly string[],
  rows: readonly Readonly<Record<string, CellValue>>[]
): Table {
  const columnSet = new Set(columns);
  if (columnSet.size !== columns.length) {
    const duplicates = columns.filter((c, i) => columns.indexOf(c) !== i);
    throw new ValidationError(
      ErrorCodes.INVALID_TABLE_SHAPE,
      `Duplicate column name(s): ${Array.from(new Set(duplicates)).join(', ')}.`,
      { details: { duplicates } }
    );
  }

  const copied = rows.map((row, index) => {
    const keys = Object.keys(row);
    const unexpected = keys.filter((k) => !columnSet.has(k));
    const missing = columns.filter((c) => !Object.prototype.hasOwnProperty.call(row, c));
    if (unexpected.length > 0 || missing.length > 0) {
      throw new ValidationError(
        ErrorCodes.INVALID_TABLE_SHAPE,
        `Row ${index} does not match the table columns.`,
        { details: { row: index, unexpected, missing } }
      );
    }
    return copyRow(row, columns);
  });

  return { columns: [...columns], rows: copied };
}

export function emptyTable(columns: readonly string[]): Table {
  return createTable(columns, []);
}

/**
 * Build a row from [column, value] pairs. Headers such as "__proto__" stay own
 * properties; plain assignment on `{}` would replace the prototype instead.
 */
export function rowFromEntries(entries: Iterable<readonly [string, CellValue]>): Record<string, CellValue> {
  return Object.fromEntries(entries);
}

/** Own cell of a row; null when the row does not carry the column. */
export function readCell(row: Row, column: string): CellValue {
  return Object.prototype.hasOwnProperty.call(row, column) ? row[column] ?? null : null;
}

/** Copy a row in column order (keeps JSON/CSV output stable). */
export function copyRow(row: Row, columns: readonly string[]): Record<string, CellValue> {
  return rowFromEntries(columns.map((column): [string, CellValue] => [column, readCell(row, column)]));
}

export function missingColumns(table: Table, columns: readonly string[]): string[] {
  return columns.filter((c) => !table.columns.includes(c));
}

/**
 * Fail with E101 when any referenced column is absent.
 */
export function assertColumns(table: Table, columns: readonly string[], label = 'table'): void {
  const missing = missingColumns(table, columns);
  if (missing.length > 0) {
    throw new ValidationError(
      ErrorCodes.COLUMN_NOT_FOUND,
      `Column(s) not found in ${label}: ${missing.join(', ')}.`,
      { details: { missing, available: [...table.columns] } }
    );
  }
}

export function previewRows(table: Table, limit: number): Record<string, CellValue>[] {
  return table.rows.slice(0, Math.max(0, limit)).map((row) => copyRow(row, table.columns));
}

export function tableShape(table: Table): [number, number] {
  return [table.rows.length, table.columns.length];
}
