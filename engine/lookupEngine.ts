// engine/lookupEngine.ts
//
// Target-driven lookup of a target sheet against the master sheet.
//
// Per target row (output order == target order):
//  - empty normalized key         → UNKEYED   (row unchanged)
//  - key once in master           → MATCH     (all value columns equivalent)
//                                   UPDATE    (master values merged into value columns)
//  - key more than once in master → DUPLICATE (row unchanged, ambiguous; never auto-merged)
//  - key not in master            → INSERT    (row unchanged, new)
//
// Only insertion-ordered structures (arrays, Map) are iterated, so identical
// inputs always give identical outputs.

import { ErrorCodes } from './errorCodes';
import { SchemaError } from './errors';
import { cellsEquivalent, createNormalizer, type Normalizer } from './normalizeFields';
import { copyRow, createTable, missingColumns } from './table';
import type {
  CellValue,
  LookupResult,
  RowClassification,
  RowLookupDetail,
  Table
} from './types';

export interface LookupOptions {
  /**
   * When set, each output row carries its classification in this column.
   * Inserted right after the key column unless the target already has it.
   */
  statusColumn?: string;
  normalize?: Normalizer;
}

/** SchemaError E201/E202 unless both tables carry the key and every value column. */
export function assertJoinColumns(
  master: Table,
  target: Table,
  keyColumn: string,
  valueColumns: readonly string[]
): void {
  for (const [label, table] of [
    ['master', master],
    ['target', target]
  ] as const) {
    if (!table.columns.includes(keyColumn)) {
      throw new SchemaError(
        ErrorCodes.KEY_COLUMN_MISSING,
        `Key column "${keyColumn}" is missing from the ${label} table.`,
        { details: { side: label, column: keyColumn } }
      );
    }
    const missing = missingColumns(table, valueColumns);
    if (missing.length > 0) {
      throw new SchemaError(
        ErrorCodes.VALUE_COLUMN_MISSING,
        `Value column(s) missing from the ${label} table: ${missing.join(', ')}.`,
        { details: { side: label, missing } }
      );
    }
  }
}

/**
 * Normalized master key → master row positions, in first-occurrence order.
 */
export function buildMasterIndex(
  master: Table,
  keyColumn: string,
  normalize: Normalizer = createNormalizer()
): Map<string, number[]> {
  const index = new Map<string, number[]>();
  master.rows.forEach((row, position) => {
    const key = normalize(row[keyColumn]);
    if (!key) return;
    const positions = index.get(key);
    if (positions) {
      positions.push(position);
    } else {
      index.set(key, [position]);
    }
  });
  return index;
}

function outputColumns(target: Table, keyColumn: string, statusColumn: string | undefined): string[] {
  if (!statusColumn || target.columns.includes(statusColumn)) {
    return [...target.columns];
  }
  const keyAt = target.columns.indexOf(keyColumn);
  return [
    ...target.columns.slice(0, keyAt + 1),
    statusColumn,
    ...target.columns.slice(keyAt + 1)
  ];
}

export function lookupTable(
  master: Table,
  target: Table,
  keyColumn: string,
  valueColumns: readonly string[],
  options: LookupOptions = {}
): LookupResult {
  assertJoinColumns(master, target, keyColumn, valueColumns);

  const normalize = options.normalize ?? createNormalizer();
  const mergeColumns = Array.from(new Set(valueColumns)).filter((c) => c !== keyColumn);
  const index = buildMasterIndex(master, keyColumn, normalize);
  const columns = outputColumns(target, keyColumn, options.statusColumn);

  const classifications: RowClassification[] = [];
  const details: RowLookupDetail[] = [];
  const referencedKeys = new Set<string>();

  const rows = target.rows.map((source) => {
    const out: Record<string, CellValue> = copyRow(source, columns);
    const key = normalize(source[keyColumn]);

    let detail: RowLookupDetail;

    if (!key) {
      detail = {
        classification: 'UNKEYED',
        key,
        masterRows: [],
        changedColumns: [],
        ambiguous: false,
        isNew: false
      };
    } else {
      referencedKeys.add(key);
      const positions = index.get(key) ?? [];

      if (positions.length === 0) {
        detail = {
          classification: 'INSERT',
          key,
          masterRows: [],
          changedColumns: [],
          ambiguous: false,
          isNew: true
        };
      } else if (positions.length > 1) {
        detail = {
          classification: 'DUPLICATE',
          key,
          masterRows: [...positions],
          changedColumns: [],
          ambiguous: true,
          isNew: false
        };
      } else {
        const masterRow = master.rows[positions[0]];
        const changedColumns = mergeColumns.filter(
          (column) => !cellsEquivalent(source[column], masterRow[column], normalize)
        );
        for (const column of changedColumns) {
          out[column] = masterRow[column] ?? null;
        }
        detail = {
          classification: changedColumns.length === 0 ? 'MATCH' : 'UPDATE',
          key,
          masterRows: [...positions],
          changedColumns,
          ambiguous: false,
          isNew: false
        };
      }
    }

    if (options.statusColumn) {
      out[options.statusColumn] = detail.classification;
    }

    classifications.push(detail.classification);
    details.push(detail);
    return copyRow(out, columns);
  });

  let unreferencedMasterRows = 0;
  const masterDuplicateKeys: string[] = [];
  for (const [key, positions] of index) {
    if (!referencedKeys.has(key)) unreferencedMasterRows += positions.length;
    if (positions.length > 1) masterDuplicateKeys.push(key);
  }

  return {
    table: createTable(columns, rows),
    classifications,
    details,
    unreferencedMasterRows,
    masterDuplicateKeys
  };
}
