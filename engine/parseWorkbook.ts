// engine/parseWorkbook.ts
//
// Decode uploaded spreadsheet bytes (.csv / .xlsx) into named tables.
// - CSV: one sheet, "Sheet1"; cells stay text so part numbers keep leading zeros.
// - XLSX: every worksheet; header row at row 1; empty header cells → "Unnamed_<n>".

import ExcelJS from 'exceljs';
import { parse } from 'csv-parse/sync';
import { ErrorCodes } from './errorCodes';
import { ValidationError } from './errors';
import { createTable, emptyTable, rowFromEntries } from './table';
import type { CellValue, SheetRef, Table } from './types';

export const CSV_SHEET_NAME = 'Sheet1';

export type WorkbookFormat = 'csv' | 'xlsx';

export interface DecodedSheet {
  name: string;
  table: Table;
}

export function detectWorkbookFormat(identifier: string): WorkbookFormat {
  const lower = identifier.trim().toLowerCase();
  if (lower.endsWith('.csv')) return 'csv';
  if (lower.endsWith('.xlsx')) return 'xlsx';
  throw new ValidationError(
    ErrorCodes.UNSUPPORTED_FILE_TYPE,
    `Unsupported file type for "${identifier}". Only .csv and .xlsx files are accepted.`,
    { details: { identifier } }
  );
}

// ------------------------------------------------------------
// Header helpers
// ------------------------------------------------------------

/**
 * Headers must be unique for the table model. Blank headers get a positional
 * name; repeats of the same raw header get ".1", ".2", …
 */
function uniqueHeaders(raw: string[]): string[] {
  const used = new Set<string>();
  return raw.map((value, index) => {
    const base = value === '' ? `Unnamed_${index + 1}` : value;
    let name = base;
    for (let n = 1; used.has(name); n++) {
      name = `${base}.${n}`;
    }
    used.add(name);
    return name;
  });
}

function buildTable(headerCells: CellValue[], dataRows: CellValue[][]): Table {
  const width = dataRows.reduce((max, r) => Math.max(max, r.length), headerCells.length);
  const rawHeaders: string[] = [];
  for (let i = 0; i < width; i++) {
    const cell = headerCells[i];
    rawHeaders.push(cell === null || cell === undefined ? '' : String(cell));
  }
  const columns = uniqueHeaders(rawHeaders);

  const rows = dataRows.map((cells) =>
    rowFromEntries(columns.map((column, i): [string, CellValue] => [column, cells[i] ?? null]))
  );

  return createTable(columns, rows);
}

// ------------------------------------------------------------
// CSV
// ------------------------------------------------------------

export function decodeCsv(text: string): Table {
  if (!text || text.trim().length === 0) {
    return emptyTable([]);
  }

  const parsed: unknown = parse(text, {
    columns: false,
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true
  });
  const records = Array.isArray(parsed) ? parsed.filter(Array.isArray) : [];

  if (records.length === 0) {
    return emptyTable([]);
  }

  const toCell = (v: unknown): CellValue => (typeof v === 'string' && v !== '' ? v : null);
  const [header, ...body] = records;
  return buildTable(
    header.map(toCell),
    body.map((r) => r.map(toCell))
  );
}

// ------------------------------------------------------------
// XLSX
// ------------------------------------------------------------

function formatDate(v: Date): string {
  const year = v.getUTCFullYear();
  const month = String(v.getUTCMonth() + 1).padStart(2, '0');
  const day = String(v.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function readCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return value === '' ? null : value;
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) return formatDate(value);

  if ('richText' in value) {
    const text = value.richText.map((part) => part.text).join('');
    return text === '' ? null : text;
  }
  if ('hyperlink' in value) {
    return readCellValue(value.text);
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : readCellValue(value.result);
  }
  if ('error' in value) {
    return value.error;
  }
  return String(value);
}

function worksheetToTable(worksheet: ExcelJS.Worksheet): Table {
  const readRow = (row: ExcelJS.Row): CellValue[] => {
    const cells: CellValue[] = [];
    for (let col = 1; col <= row.cellCount; col++) {
      cells.push(readCellValue(row.getCell(col).value));
    }
    return cells;
  };

  if (worksheet.rowCount === 0) {
    return emptyTable([]);
  }

  const header = readRow(worksheet.getRow(1));
  const body: CellValue[][] = [];
  for (let rowIndex = 2; rowIndex <= worksheet.rowCount; rowIndex++) {
    const cells = readRow(worksheet.getRow(rowIndex));
    // Rows exceljs never materialized are not data rows.
    if (cells.every((c) => c === null)) continue;
    body.push(cells);
  }

  return buildTable(header, body);
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

export async function decodeXlsx(bytes: Uint8Array): Promise<DecodedSheet[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(toArrayBuffer(bytes));
  } catch (err) {
    throw new ValidationError(
      ErrorCodes.UNSUPPORTED_FILE_TYPE,
      'File could not be read as an .xlsx workbook.',
      { cause: err }
    );
  }

  return workbook.worksheets.map((worksheet) => ({
    name: worksheet.name,
    table: worksheetToTable(worksheet)
  }));
}

// ------------------------------------------------------------
// Entry points
// ------------------------------------------------------------

/**
 * Decode every sheet of a file. The format is taken from the identifier's extension.
 */
export async function decodeWorkbook(bytes: Uint8Array, identifier: string): Promise<DecodedSheet[]> {
  const format = detectWorkbookFormat(identifier);
  if (format === 'csv') {
    const text = Buffer.from(bytes).toString('utf8');
    return [{ name: CSV_SHEET_NAME, table: decodeCsv(text) }];
  }
  return decodeXlsx(bytes);
}

export function selectSheet(sheets: DecodedSheet[], ref: SheetRef): Table {
  const sheet = sheets.find((s) => s.name === ref.sheet);
  if (!sheet) {
    throw new ValidationError(
      ErrorCodes.SHEET_NOT_FOUND,
      `Sheet "${ref.sheet}" does not exist in "${ref.source}".`,
      { details: { sheet: ref.sheet, available: sheets.map((s) => s.name) } }
    );
  }
  return sheet.table;
}
