// engine/cleanSheet.ts
//
// Sheet cleaning: header trimming/collision handling, empty-row removal,
// key-column normalization and empty-key flagging.
//
// Pure: the input table is never mutated; anomalies go to the CleaningReport,
// the only thrown error is E101 for a key/text column the table does not have.

import { ErrorCodes } from './errorCodes';
import { ValidationError } from './errors';
import { createNormalizer, isEmptyCell, type Normalizer } from './normalizeFields';
import { createTable, readCell, rowFromEntries } from './table';
import type {
  CellValue,
  CleanResult,
  CleaningReport,
  ColumnRename,
  KeyValueChange,
  Table
} from './types';

export interface CleanConfig {
  /** Extra columns whose cells are normalized like the key column. */
  textColumns?: string[];
  /** Move the key column to position 0 (the master sheet layout). */
  moveKeyFirst?: boolean;
  normalize?: Normalizer;
}

interface HeaderPlan {
  original: string;
  cleaned: string;
}

/**
 * Trim headers; when two headers share a normalized form the later one gets
 * `_2`, `_3`, … until its normalized form is unused.
 */
function planHeaders(
  columns: readonly string[],
  normalize: Normalizer
): { plan: HeaderPlan[]; renamed: ColumnRename[]; collisions: ColumnRename[] } {
  const plan: HeaderPlan[] = [];
  const renamed: ColumnRename[] = [];
  const collisions: ColumnRename[] = [];
  const usedForms = new Set<string>();
  const usedNames = new Set<string>();

  for (const original of columns) {
    const trimmed = original.trim();
    let cleaned = trimmed;

    if (usedForms.has(normalize(cleaned)) || usedNames.has(cleaned)) {
      let suffix = 2;
      while (usedForms.has(normalize(`${trimmed}_${suffix}`)) || usedNames.has(`${trimmed}_${suffix}`)) {
        suffix += 1;
      }
      cleaned = `${trimmed}_${suffix}`;
      collisions.push({ from: original, to: cleaned });
    }

    if (cleaned !== original) {
      renamed.push({ from: original, to: cleaned });
    }

    usedForms.add(normalize(cleaned));
    usedNames.add(cleaned);
    plan.push({ original, cleaned });
  }

  return { plan, renamed, collisions };
}

function resolveColumn(plan: HeaderPlan[], requested: string): string | null {
  const exact = plan.find((h) => h.original === requested);
  if (exact) return exact.cleaned;
  const trimmed = requested.trim();
  const cleaned = plan.find((h) => h.cleaned === trimmed);
  return cleaned ? cleaned.cleaned : null;
}

function requireColumn(plan: HeaderPlan[], requested: string, role: string): string {
  const resolved = resolveColumn(plan, requested);
  if (resolved === null) {
    throw new ValidationError(
      ErrorCodes.COLUMN_NOT_FOUND,
      `${role} "${requested}" does not exist in the table.`,
      { details: { column: requested, available: plan.map((h) => h.cleaned) } }
    );
  }
  return resolved;
}

function isRowCompletelyEmpty(row: Readonly<Record<string, CellValue>>, columns: readonly string[]): boolean {
  return columns.every((column) => isEmptyCell(row[column]));
}

/**
 * Clean one sheet around its key column.
 */
export function cleanTable(table: Table, keyColumn: string, config: CleanConfig = {}): CleanResult {
  const normalize = config.normalize ?? createNormalizer();
  const { plan, renamed, collisions } = planHeaders(table.columns, normalize);

  const key = requireColumn(plan, keyColumn, 'Key column');
  const textColumns = (config.textColumns ?? [])
    .map((c) => requireColumn(plan, c, 'Text column'))
    .filter((c) => c !== key);

  let columns = plan.map((h) => h.cleaned);
  if (config.moveKeyFirst) {
    columns = [key, ...columns.filter((c) => c !== key)];
  }

  // 1) Drop fully-empty rows before any normalization
  const kept = table.rows.filter((row) => !isRowCompletelyEmpty(row, table.columns));

  // 2) Rename + normalize
  const keyChanges: KeyValueChange[] = [];
  const invalidRows: number[] = [];
  let textCellsNormalized = 0;

  const rows = kept.map((source, index) => {
    const out = rowFromEntries(plan.map((h): [string, CellValue] => [h.cleaned, readCell(source, h.original)]));

    const before = out[key];
    const after = normalize(before);
    if (String(before ?? '') !== after) {
      keyChanges.push({ row: index, before, after });
    }
    out[key] = after;
    if (after === '') {
      invalidRows.push(index);
    }

    for (const column of textColumns) {
      const raw = out[column];
      if (isEmptyCell(raw)) continue;
      const normalized = normalize(raw);
      if (String(raw) !== normalized) {
        textCellsNormalized += 1;
      }
      out[column] = normalized;
    }

    return out;
  });

  const report: CleaningReport = {
    originalRowCount: table.rows.length,
    rowCount: rows.length,
    rowsDropped: table.rows.length - kept.length,
    rowsNormalized: keyChanges.length,
    keyChanges,
    rowsFlaggedInvalid: invalidRows.length,
    invalidRows,
    columnsRenamed: renamed,
    headerCollisions: collisions,
    textCellsNormalized,
    keyColumn: key
  };

  return { table: createTable(columns, rows), report };
}
