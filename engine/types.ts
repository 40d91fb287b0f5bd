// engine/types.ts
// Shared TypeScript interfaces for the BOM lookup engine.

/**
 * A single cell. `null` is the empty cell; decoders never produce `undefined`.
 */
export type CellValue = string | number | null;

export type Row = Readonly<Record<string, CellValue>>;

/**
 * Table – ordered rows over a fixed, unique column set.
 * Built through createTable() (engine/table.ts), which enforces that every row
 * carries exactly `columns`.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/** Identifies one table within a multi-sheet file. */
export interface SheetRef {
  source: string;
  sheet: string;
}

export type RowClassification = 'MATCH' | 'UPDATE' | 'INSERT' | 'DUPLICATE' | 'UNKEYED';

export const ROW_CLASSIFICATIONS: readonly RowClassification[] = [
  'MATCH',
  'UPDATE',
  'INSERT',
  'DUPLICATE',
  'UNKEYED'
];

// ------------------------------------------------------------
// Cleaning
// ------------------------------------------------------------

export interface ColumnRename {
  from: string;
  to: string;
}

export interface KeyValueChange {
  /** Position in the cleaned table. */
  row: number;
  before: CellValue;
  after: string;
}

export interface CleaningReport {
  originalRowCount: number;
  rowCount: number;
  rowsDropped: number;
  rowsNormalized: number;
  keyChanges: KeyValueChange[];
  /** Rows whose key is empty after normalization. Not join-eligible. */
  rowsFlaggedInvalid: number;
  invalidRows: number[];
  columnsRenamed: ColumnRename[];
  headerCollisions: ColumnRename[];
  textCellsNormalized: number;
  keyColumn: string;
}

export interface CleanResult {
  table: Table;
  report: CleaningReport;
}

// ------------------------------------------------------------
// Lookup
// ------------------------------------------------------------

export interface RowLookupDetail {
  classification: RowClassification;
  /** Normalized key used for the index lookup ('' when UNKEYED). */
  key: string;
  /** Master positions sharing the key; first one is the primary. */
  masterRows: number[];
  changedColumns: string[];
  ambiguous: boolean;
  isNew: boolean;
}

export interface LookupResult {
  table: Table;
  classifications: RowClassification[];
  details: RowLookupDetail[];
  unreferencedMasterRows: number;
  /** Normalized master keys that occur more than once, in first-occurrence order. */
  masterDuplicateKeys: string[];
}

// ------------------------------------------------------------
// KPI
// ------------------------------------------------------------

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type ClassificationCounts = Record<RowClassification, number>;

export interface KpiSnapshot {
  readonly counts: Readonly<ClassificationCounts>;
  /** Rows that received a MATCH/UPDATE/INSERT/DUPLICATE classification. */
  readonly classifiedTotal: number;
  readonly unkeyedCount: number;
  readonly matchRate: number;
  readonly updateRate: number;
  readonly insertRate: number;
  readonly duplicateRate: number;
  readonly percentages: Readonly<Record<Exclude<RowClassification, 'UNKEYED'>, number>>;
  readonly unreferencedMasterRows: number;
  readonly riskLevel: RiskLevel;
}
