// engine/masterUpdate.ts
//
// Apply a lookup run to the master sheet.
//  - INSERT     → appended to master (projected onto master columns)
//  - DUPLICATE  → reported, master untouched (ambiguity is never resolved by guessing)
//  - MATCH/UPDATE → master already holds the key; unchanged
//  - UNKEYED    → skipped
//
// A new key seen twice in the target is inserted once; the repeat is reported
// as a TARGET duplicate.

import { copyRow, createTable } from './table';
import type { CellValue, LookupResult, Table } from './types';

export type DuplicateSource = 'MASTER' | 'TARGET';

export interface MasterDuplicate {
  key: string;
  source: DuplicateSource;
  targetRow: number;
  masterRows: number[];
  record: Record<string, CellValue>;
}

export interface MasterUpdateStats {
  insertedCount: number;
  unchangedCount: number;
  duplicatesCount: number;
  skippedCount: number;
}

export interface MasterUpdateResult {
  table: Table;
  stats: MasterUpdateStats;
  duplicates: MasterDuplicate[];
}

export function applyLookupToMaster(master: Table, target: Table, lookup: LookupResult): MasterUpdateResult {
  const rows: Record<string, CellValue>[] = master.rows.map((row) => copyRow(row, master.columns));
  const duplicates: MasterDuplicate[] = [];
  const insertedKeys = new Set<string>();
  const stats: MasterUpdateStats = {
    insertedCount: 0,
    unchangedCount: 0,
    duplicatesCount: 0,
    skippedCount: 0
  };

  lookup.details.forEach((detail, position) => {
    const source = target.rows[position];

    switch (detail.classification) {
      case 'INSERT':
        if (insertedKeys.has(detail.key)) {
          duplicates.push({
            key: detail.key,
            source: 'TARGET',
            targetRow: position,
            masterRows: [],
            record: copyRow(source, target.columns)
          });
          stats.duplicatesCount += 1;
          return;
        }
        insertedKeys.add(detail.key);
        rows.push(copyRow(source, master.columns));
        stats.insertedCount += 1;
        return;

      case 'DUPLICATE':
        duplicates.push({
          key: detail.key,
          source: 'MASTER',
          targetRow: position,
          masterRows: [...detail.masterRows],
          record: copyRow(source, target.columns)
        });
        stats.duplicatesCount += 1;
        return;

      case 'MATCH':
      case 'UPDATE':
        stats.unchangedCount += 1;
        return;

      case 'UNKEYED':
        stats.skippedCount += 1;
        return;
    }
  });

  return { table: createTable(master.columns, rows), stats, duplicates };
}
