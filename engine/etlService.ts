// engine/etlService.ts
//
// Orchestration over the pure engine:
//   file store → decoder → Cleaner / LookupEngine / KPIReporter → stored table refs
//
// Intermediate tables are stored as JSON under config.storage.tablesPrefix and
// addressed by their storage identifier (the "table ref"). Nothing is cached in
// process; every operation re-reads what it needs from the store.

import { randomUUID } from 'crypto';
import { cleanTable } from './cleanSheet';
import { listLookupColumns, suggestColumns, type ColumnSuggestion } from './columnAutoSuggest';
import {
  profileColumn,
  profileUnreferencedColumn,
  type ColumnProfile,
  type UnreferencedColumnProfile
} from './columnProfile';
import { loadEngineConfig, type EngineConfig } from './config';
import { CSV_CONTENT_TYPE, encodeTableAsCsv } from './csvExport';
import { XLSX_CONTENT_TYPE, encodeTableAsXlsx } from './excelExport';
import { BlobFileStore, type FileStore } from './fileStore';
import { summarizeLookup } from './kpiSummary';
import { logInfo, logWarn } from './logger';
import { lookupTable } from './lookupEngine';
import { applyLookupToMaster, type MasterDuplicate, type MasterUpdateStats } from './masterUpdate';
import { createNormalizer } from './normalizeFields';
import { decodeWorkbook, selectSheet } from './parseWorkbook';
import { copyRow, previewRows, tableShape } from './table';
import { TABLE_CONTENT_TYPE, decodeTable, encodeTable } from './tableCodec';
import type { CellValue, CleaningReport, KpiSnapshot, LookupResult, Table } from './types';

export type ExportFormat = 'csv' | 'xlsx';

export interface SheetOverview {
  name: string;
  columns: string[];
  shape: [number, number];
  preview: Record<string, CellValue>[];
}

export interface CleanRequestOptions {
  textColumns?: string[];
  moveKeyFirst?: boolean;
}

export interface CleanOutcome {
  tableRef: string;
  columns: string[];
  shape: [number, number];
  report: CleaningReport;
  preview: Record<string, CellValue>[];
}

export interface LookupOutcome {
  tableRef: string;
  columns: string[];
  kpi: KpiSnapshot;
  masterDuplicateKeys: string[];
  preview: Record<string, CellValue>[];
  downloadPath: string;
}

export interface ExportedFile {
  fileName: string;
  contentType: string;
  bytes: Buffer;
}

export interface ProcessUpdatesOutcome {
  tableRef: string;
  shape: [number, number];
  stats: MasterUpdateStats;
  duplicates: MasterDuplicate[];
  downloadPath: string;
}

export interface UpdatePreview {
  stats: MasterUpdateStats;
  kpi: KpiSnapshot;
  /** First rows that would be appended to master. */
  inserted: Record<string, CellValue>[];
  duplicates: MasterDuplicate[];
}

/** Restricts a column analysis to master rows the target never references. */
export interface UnreferencedFilter {
  targetTableRef: string;
  keyColumn: string;
}

export interface EtlService {
  listSheets(fileRef: string, previewRowCount?: number): Promise<SheetOverview[]>;
  clean(fileRef: string, sheetName: string, keyColumn: string, options?: CleanRequestOptions): Promise<CleanOutcome>;
  suggestColumn(header: string, candidates: readonly string[], limit?: number): ColumnSuggestion[];
  lookupColumns(tableRef: string): Promise<string[]>;
  lookup(
    masterTableRef: string,
    targetTableRef: string,
    keyColumn: string,
    valueColumns: readonly string[]
  ): Promise<LookupOutcome>;
  exportTable(tableRef: string, format: ExportFormat): Promise<ExportedFile>;
  analyzeColumn(
    tableRef: string,
    column: string,
    filter?: UnreferencedFilter
  ): Promise<ColumnProfile | UnreferencedColumnProfile>;
  previewUpdates(
    masterTableRef: string,
    targetTableRef: string,
    keyColumn: string,
    valueColumns: readonly string[]
  ): Promise<UpdatePreview>;
  processUpdates(
    masterTableRef: string,
    targetTableRef: string,
    keyColumn: string,
    valueColumns: readonly string[]
  ): Promise<ProcessUpdatesOutcome>;
}

export interface EtlServiceDeps {
  /** Id generator for new table refs. */
  newId?: () => string;
}

export function exportDownloadPath(tableRef: string, format: ExportFormat = 'xlsx'): string {
  return `/api/export?table_ref=${encodeURIComponent(tableRef)}&format=${format}`;
}

/** Download name for a ref; only [A-Za-z0-9._-] reach the Content-Disposition header. */
export function exportFileName(tableRef: string, format: ExportFormat): string {
  const base = (tableRef.split('/').pop() ?? tableRef).replace(/\.json$/i, '');
  const safe = base.replace(/[^A-Za-z0-9._-]/g, '_');
  return `${safe || 'table'}.${format}`;
}

export function createEtlService(store: FileStore, config: EngineConfig, deps: EtlServiceDeps = {}): EtlService {
  const normalize = createNormalizer(config.normalizer);
  const newId = deps.newId ?? randomUUID;

  async function loadTable(tableRef: string): Promise<Table> {
    const bytes = await store.fetch(tableRef);
    return decodeTable(bytes, tableRef);
  }

  async function saveTable(table: Table): Promise<string> {
    const tableRef = `${config.storage.tablesPrefix}${newId()}.json`;
    const confirmation = await store.store(tableRef, encodeTable(table), TABLE_CONTENT_TYPE);
    return confirmation.identifier;
  }

  async function runLookup(
    masterTableRef: string,
    targetTableRef: string,
    keyColumn: string,
    valueColumns: readonly string[]
  ): Promise<{ master: Table; target: Table; result: LookupResult }> {
    const [master, target] = await Promise.all([loadTable(masterTableRef), loadTable(targetTableRef)]);
    const result = lookupTable(master, target, keyColumn, valueColumns, {
      statusColumn: config.statusColumn,
      normalize
    });
    return { master, target, result };
  }

  function summarize(result: LookupResult): KpiSnapshot {
    return summarizeLookup(result.classifications, {
      thresholds: config.risk,
      unreferencedMasterRows: result.unreferencedMasterRows
    });
  }

  return {
    async listSheets(fileRef, previewRowCount = config.preview.sheetRows) {
      const bytes = await store.fetch(fileRef);
      const sheets = await decodeWorkbook(bytes, fileRef);

      logInfo('sheets_listed', { file_ref: fileRef, sheet_count: sheets.length });

      return sheets.map(({ name, table }) => ({
        name,
        columns: [...table.columns],
        shape: tableShape(table),
        preview: previewRows(table, previewRowCount)
      }));
    },

    async clean(fileRef, sheetName, keyColumn, options = {}) {
      const bytes = await store.fetch(fileRef);
      const sheets = await decodeWorkbook(bytes, fileRef);
      const source = selectSheet(sheets, { source: fileRef, sheet: sheetName });

      const { table, report } = cleanTable(source, keyColumn, {
        textColumns: options.textColumns,
        moveKeyFirst: options.moveKeyFirst,
        normalize
      });
      const tableRef = await saveTable(table);

      logInfo('table_cleaned', {
        file_ref: fileRef,
        sheet: sheetName,
        table_ref: tableRef,
        rows: report.rowCount,
        rows_dropped: report.rowsDropped,
        rows_normalized: report.rowsNormalized,
        rows_flagged_invalid: report.rowsFlaggedInvalid
      });
      if (report.rowsFlaggedInvalid > 0) {
        logWarn('empty_keys_flagged', { table_ref: tableRef, rows: report.invalidRows.length });
      }

      return {
        tableRef,
        columns: [...table.columns],
        shape: tableShape(table),
        report,
        preview: previewRows(table, config.preview.cleanRows)
      };
    },

    suggestColumn(header, candidates, limit = config.suggestionLimit) {
      return suggestColumns(header, candidates, { limit, normalize });
    },

    async lookupColumns(tableRef) {
      const table = await loadTable(tableRef);
      return listLookupColumns(table, config.lookupColumnRange);
    },

    async lookup(masterTableRef, targetTableRef, keyColumn, valueColumns) {
      const { result } = await runLookup(masterTableRef, targetTableRef, keyColumn, valueColumns);
      const kpi = summarize(result);
      const tableRef = await saveTable(result.table);

      logInfo('lookup_completed', {
        master_ref: masterTableRef,
        target_ref: targetTableRef,
        table_ref: tableRef,
        counts: kpi.counts,
        risk_level: kpi.riskLevel
      });
      if (result.masterDuplicateKeys.length > 0) {
        logWarn('master_duplicate_keys', {
          master_ref: masterTableRef,
          duplicate_keys: result.masterDuplicateKeys.length
        });
      }

      return {
        tableRef,
        columns: [...result.table.columns],
        kpi,
        masterDuplicateKeys: result.masterDuplicateKeys,
        preview: previewRows(result.table, config.preview.lookupRows),
        downloadPath: exportDownloadPath(tableRef)
      };
    },

    async exportTable(tableRef, format) {
      const table = await loadTable(tableRef);
      const bytes = format === 'csv' ? encodeTableAsCsv(table) : await encodeTableAsXlsx(table);

      logInfo('table_exported', { table_ref: tableRef, format, bytes: bytes.byteLength });

      return {
        fileName: exportFileName(tableRef, format),
        contentType: format === 'csv' ? CSV_CONTENT_TYPE : XLSX_CONTENT_TYPE,
        bytes
      };
    },

    async analyzeColumn(tableRef, column, filter) {
      if (!filter) {
        const table = await loadTable(tableRef);
        return profileColumn(table, column);
      }
      const [master, target] = await Promise.all([loadTable(tableRef), loadTable(filter.targetTableRef)]);
      return profileUnreferencedColumn(master, target, filter.keyColumn, column, normalize);
    },

    async previewUpdates(masterTableRef, targetTableRef, keyColumn, valueColumns) {
      const { master, target, result } = await runLookup(masterTableRef, targetTableRef, keyColumn, valueColumns);
      const update = applyLookupToMaster(master, target, result);
      const kpi = summarize(result);
      const limit = config.preview.duplicateRows;
      const appended = update.table.rows.slice(master.rows.length);

      logInfo('updates_previewed', {
        master_ref: masterTableRef,
        target_ref: targetTableRef,
        inserted: update.stats.insertedCount,
        duplicates: update.stats.duplicatesCount,
        risk_level: kpi.riskLevel
      });

      return {
        stats: update.stats,
        kpi,
        inserted: appended.slice(0, limit).map((row) => copyRow(row, update.table.columns)),
        duplicates: update.duplicates.slice(0, limit)
      };
    },

    async processUpdates(masterTableRef, targetTableRef, keyColumn, valueColumns) {
      const { master, target, result } = await runLookup(masterTableRef, targetTableRef, keyColumn, valueColumns);
      const update = applyLookupToMaster(master, target, result);
      const tableRef = await saveTable(update.table);

      logInfo('master_updated', {
        master_ref: masterTableRef,
        target_ref: targetTableRef,
        table_ref: tableRef,
        inserted: update.stats.insertedCount,
        duplicates: update.stats.duplicatesCount
      });

      return {
        tableRef,
        shape: tableShape(update.table),
        stats: update.stats,
        duplicates: update.duplicates.slice(0, config.preview.duplicateRows),
        downloadPath: exportDownloadPath(tableRef)
      };
    }
  };
}

/**
 * Service wired to Vercel Blob with the environment's config (used by api/ handlers).
 */
export function createBlobEtlService(env: Record<string, string | undefined> = process.env): EtlService {
  const config = loadEngineConfig(env);
  return createEtlService(new BlobFileStore({ token: config.storage.token }), config);
}
