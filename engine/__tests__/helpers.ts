// engine/__tests__/helpers.ts
import { createTable } from '../table';
import type { CellValue, Table } from '../types';

/** Run fn and return what it threw; fails the test when nothing is thrown. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected an error to be thrown.');
}

/** Table from a header list and positional rows. */
export function tableOf(columns: string[], rows: CellValue[][]): Table {
  return createTable(
    columns,
    rows.map((cells) => Object.fromEntries(columns.map((column, i) => [column, cells[i] ?? null])))
  );
}

export function snapshot(table: Table): unknown {
  return JSON.parse(JSON.stringify(table));
}
