// engine/excelExport.ts
import ExcelJS from 'exceljs';
import type { Table } from './types';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const DEFAULT_EXPORT_SHEET = 'Lookup_Output';

// -------------------------------
// Table workbook (single sheet)
// -------------------------------
export function createTableWorkbook(table: Table, sheetName = DEFAULT_EXPORT_SHEET): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);

  const headers = [...table.columns];
  sheet.addRow(headers);
  sheet.getRow(1).font = { bold: true };

  for (const row of table.rows) {
    sheet.addRow(headers.map((column) => row[column] ?? null));
  }

  if (headers.length > 0) {
    sheet.autoFilter = {
      from: { row: 1, column: 1 },
      to: { row: 1, column: headers.length }
    };
  }

  // Auto width per column
  headers.forEach((header, index) => {
    const column = sheet.getColumn(index + 1);

    let maxLength = header.length;
    column.eachCell({ includeEmpty: false }, (cell) => {
      const value = cell.value;
      const str = typeof value === 'string' ? value : value?.toString() ?? '';
      if (str.length > maxLength) maxLength = str.length;
    });

    column.width = Math.min(Math.max(maxLength + 4, 12), 80);
  });

  return workbook;
}

export async function encodeTableAsXlsx(table: Table, sheetName?: string): Promise<Buffer> {
  const workbook = createTableWorkbook(table, sheetName);
  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
