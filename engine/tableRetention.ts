// engine/tableRetention.ts
// Delete stored tables older than the configured age. Supports dry-run (no deletions).

import type { FileStore } from './fileStore';

export interface TableCleanupOptions {
  prefix: string;
  maxAgeHours: number;
  dryRun: boolean;
  now?: Date;
}

export interface TableCleanupSummary {
  dry_run: boolean;
  prefix: string;
  scanned: number;
  eligible: number;
  deleted: number;
  would_delete: number;
  sample_deleted: string[];
  sample_kept: string[];
}

const SAMPLE_SIZE = 5;

export async function cleanupStoredTables(
  store: FileStore,
  options: TableCleanupOptions
): Promise<TableCleanupSummary> {
  const now = (options.now ?? new Date()).getTime();
  const maxAgeMs = options.maxAgeHours * 60 * 60 * 1000;

  const files = await store.list(options.prefix);
  let eligible = 0;
  let deleted = 0;
  const sample_deleted: string[] = [];
  const sample_kept: string[] = [];

  for (const file of files) {
    const uploadedAt = file.uploadedAt.getTime();

    // Never delete unknown-age files.
    if (!Number.isFinite(uploadedAt) || now - uploadedAt <= maxAgeMs) {
      if (sample_kept.length < SAMPLE_SIZE) sample_kept.push(file.identifier);
      continue;
    }

    eligible += 1;
    if (!options.dryRun) {
      await store.remove(file.identifier);
      deleted += 1;
    }
    if (sample_deleted.length < SAMPLE_SIZE) sample_deleted.push(file.identifier);
  }

  return {
    dry_run: options.dryRun,
    prefix: options.prefix,
    scanned: files.length,
    eligible,
    deleted,
    would_delete: options.dryRun ? eligible : 0,
    sample_deleted,
    sample_kept
  };
}
