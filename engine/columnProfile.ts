// engine/columnProfile.ts
// Value distribution of a single column.

import { assertJoinColumns, buildMasterIndex } from './lookupEngine';
import { createNormalizer, toSafeTrimmedString, type Normalizer } from './normalizeFields';
import { assertColumns } from './table';
import type { Row, Table } from './types';

export interface ColumnValueCount {
  /** Trimmed cell text; '' groups every empty cell. */
  value: string;
  count: number;
  percentage: number;
}

export interface ColumnProfile {
  column: string;
  totalRows: number;
  distinctValues: number;
  emptyCount: number;
  values: ColumnValueCount[];
}

export interface UnreferencedColumnProfile extends ColumnProfile {
  /** Master rows before filtering; totalRows counts the unreferenced ones. */
  masterRows: number;
}

function profileRows(rows: readonly Row[], column: string): ColumnProfile {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const value = toSafeTrimmedString(row[column]);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  const total = rows.length;
  // Map keeps first-appearance order; the stable sort keeps it for equal counts.
  const values = Array.from(counts, ([value, count]) => ({
    value,
    count,
    percentage: total === 0 ? 0 : Math.round((count / total) * 10000) / 100
  })).sort((a, b) => b.count - a.count);

  return {
    column,
    totalRows: total,
    distinctValues: values.length,
    emptyCount: counts.get('') ?? 0,
    values
  };
}

export function profileColumn(table: Table, column: string): ColumnProfile {
  assertColumns(table, [column]);
  return profileRows(table.rows, column);
}

/**
 * Profile a master column over the master rows whose normalized key no target
 * row carries. Master rows with an empty key are never counted.
 */
export function profileUnreferencedColumn(
  master: Table,
  target: Table,
  keyColumn: string,
  column: string,
  normalize: Normalizer = createNormalizer()
): UnreferencedColumnProfile {
  assertJoinColumns(master, target, keyColumn, []);
  assertColumns(master, [column], 'master');

  const referenced = new Set<string>();
  for (const row of target.rows) {
    const key = normalize(row[keyColumn]);
    if (key) referenced.add(key);
  }

  const positions: number[] = [];
  for (const [key, rows] of buildMasterIndex(master, keyColumn, normalize)) {
    if (referenced.has(key)) continue;
    for (const position of rows) positions.push(position);
  }
  positions.sort((a, b) => a - b);

  return {
    ...profileRows(
      positions.map((position) => master.rows[position]),
      column
    ),
    masterRows: master.rows.length
  };
}
