import ExcelJS from 'exceljs';
import { ValidationError } from '../errors';
import { decodeCsv, decodeWorkbook, detectWorkbookFormat, selectSheet } from '../parseWorkbook';
import { captureError } from './helpers';

async function buildWorkbook(): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();

  const master = workbook.addWorksheet('Master');
  master.addRow(['PN', 'DESC', 'QTY']);
  master.addRow(['AB-12', 'Wire', 5]);
  master.addRow(['CD-3', { richText: [{ text: 'Bo' }, { text: 'lt' }] }, { formula: '2*5', result: 10 }]);

  const notes = workbook.addWorksheet('Notes');
  notes.addRow(['NOTE', null, 'NOTE']);
  notes.addRow(['check', 'x', null]);

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

describe('decodeCsv', () => {
  test('keeps cells as text and empty cells as null', () => {
    const table = decodeCsv('PN,DESC,QTY\n007,Wire,5\n,,\nAB-1,"Bolt, M4",\n');

    expect(table.columns).toEqual(['PN', 'DESC', 'QTY']);
    expect(table.rows).toEqual([
      { PN: '007', DESC: 'Wire', QTY: '5' },
      { PN: null, DESC: null, QTY: null },
      { PN: 'AB-1', DESC: 'Bolt, M4', QTY: null }
    ]);
  });

  test('strips a UTF-8 byte order mark', () => {
    expect(decodeCsv('\uFEFFPN,DESC\nA,B\n').columns).toEqual(['PN', 'DESC']);
  });

  test('names blank headers and de-duplicates repeated ones', () => {
    expect(decodeCsv('PN,,PN\n1,2,3\n').columns).toEqual(['PN', 'Unnamed_2', 'PN.1']);
  });

  test('pads short rows and widens the header for long ones', () => {
    const table = decodeCsv('A,B\n1\n1,2,3\n');

    expect(table.columns).toEqual(['A', 'B', 'Unnamed_3']);
    expect(table.rows).toEqual([
      { A: '1', B: null, Unnamed_3: null },
      { A: '1', B: '2', Unnamed_3: '3' }
    ]);
  });

  test('a "__proto__" header is an ordinary column', () => {
    const table = decodeCsv('PN,__proto__\nA,1\n');

    expect(table.columns).toEqual(['PN', '__proto__']);
    expect(Object.entries(table.rows[0])).toEqual([['PN', 'A'], ['__proto__', '1']]);
    expect(Object.getPrototypeOf(table.rows[0])).toBe(Object.prototype);
  });

  test('blank input is an empty table', () => {
    expect(decodeCsv('  \n')).toEqual({ columns: [], rows: [] });
  });
});

describe('decodeWorkbook', () => {
  test('a CSV file has a single sheet named Sheet1', async () => {
    const sheets = await decodeWorkbook(Buffer.from('PN\nA\n'), 'uploads/bom.CSV');

    expect(sheets).toHaveLength(1);
    expect(sheets[0].name).toBe('Sheet1');
    expect(sheets[0].table.rows).toEqual([{ PN: 'A' }]);
  });

  test('reads every worksheet of an xlsx file', async () => {
    const sheets = await decodeWorkbook(await buildWorkbook(), 'book.xlsx');

    expect(sheets.map((s) => s.name)).toEqual(['Master', 'Notes']);
    expect(sheets[0].table.columns).toEqual(['PN', 'DESC', 'QTY']);
    expect(sheets[0].table.rows).toEqual([
      { PN: 'AB-12', DESC: 'Wire', QTY: 5 },
      { PN: 'CD-3', DESC: 'Bolt', QTY: 10 }
    ]);
    expect(sheets[1].table.columns).toEqual(['NOTE', 'Unnamed_2', 'NOTE.1']);
    expect(sheets[1].table.rows).toEqual([{ NOTE: 'check', Unnamed_2: 'x', 'NOTE.1': null }]);
  });

  test('unsupported extensions fail with E104', async () => {
    await expect(decodeWorkbook(Buffer.from('x'), 'notes.txt')).rejects.toMatchObject({ code: 'E104' });
  });

  test('bytes that are not a workbook fail with E104', async () => {
    await expect(decodeWorkbook(Buffer.from('not a zip'), 'broken.xlsx')).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('detectWorkbookFormat', () => {
  test('is driven by the extension', () => {
    expect(detectWorkbookFormat('a/b/c.xlsx')).toBe('xlsx');
    expect(detectWorkbookFormat('c.csv')).toBe('csv');
    expect(captureError(() => detectWorkbookFormat('c.xls'))).toMatchObject({ code: 'E104' });
  });
});

describe('selectSheet', () => {
  test('a missing sheet fails with E102 and lists what exists', async () => {
    const sheets = await decodeWorkbook(await buildWorkbook(), 'book.xlsx');
    const err = captureError(() => selectSheet(sheets, { source: 'book.xlsx', sheet: 'Target' }));

    expect(err).toMatchObject({ code: 'E102', details: { sheet: 'Target', available: ['Master', 'Notes'] } });
  });
});
