import {
  parseJsonBody,
  queryToBody,
  validateAnalyzeColumnRequest,
  validateCleanRequest,
  validateExportRequest,
  validateLookupRequest,
  validateSheetsRequest,
  validateSuggestColumnRequest
} from '../validateRequest';

describe('parseJsonBody', () => {
  test('accepts a parsed object or a JSON string', () => {
    expect(parseJsonBody({ a: 1 })).toEqual({ ok: true, value: { a: 1 } });
    expect(parseJsonBody('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  test('malformed JSON is E601', () => {
    expect(parseJsonBody('{bad')).toEqual({
      ok: false,
      errorStatus: 400,
      errorBody: { error: 'Request body is not valid JSON.', error_codes: ['E601'] }
    });
  });

  test.each([[null], ['[1,2]'], [42]])('%j is not an object (E602)', (raw) => {
    const result = parseJsonBody(raw);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.errorBody.error_codes).toEqual(['E602']);
  });
});

describe('endpoint validators', () => {
  test('sheets: preview_rows may arrive as text', () => {
    expect(validateSheetsRequest({ file_ref: 'uploads/a.csv', preview_rows: '3' })).toEqual({
      ok: true,
      value: { file_ref: 'uploads/a.csv', preview_rows: 3 }
    });
    expect(validateSheetsRequest({ file_ref: 'uploads/a.csv', preview_rows: -1 }).ok).toBe(false);
    expect(validateSheetsRequest({}).ok).toBe(false);
  });

  test('clean: optional fields are type-checked', () => {
    const base = { file_ref: 'a.xlsx', sheet: 'Master', key_column: 'PN' };

    expect(validateCleanRequest(base)).toEqual({
      ok: true,
      value: { ...base, text_columns: undefined, move_key_first: undefined }
    });
    expect(validateCleanRequest({ ...base, text_columns: ['DESC', 3] }).ok).toBe(false);
    expect(validateCleanRequest({ ...base, move_key_first: 'yes' }).ok).toBe(false);
    expect(validateCleanRequest({ ...base, sheet: '  ' }).ok).toBe(false);
  });

  test('suggestColumn: candidates must be strings', () => {
    expect(validateSuggestColumnRequest({ header: 'PN', candidates: ['A', 'B'], limit: 1 })).toEqual({
      ok: true,
      value: { header: 'PN', candidates: ['A', 'B'], limit: 1 }
    });
    expect(validateSuggestColumnRequest({ header: 'PN', candidates: 'A' }).ok).toBe(false);
  });

  test('lookup: value_columns is required', () => {
    const result = validateLookupRequest({ master_ref: 'm', target_ref: 't', key_column: 'PN' });

    expect(result).toEqual({
      ok: false,
      errorStatus: 400,
      errorBody: { error: 'value_columns must be an array of strings.', error_codes: ['E602'] }
    });
  });

  test('export: format defaults to xlsx and is case-insensitive', () => {
    expect(validateExportRequest(queryToBody({ table_ref: 't.json' }))).toEqual({
      ok: true,
      value: { table_ref: 't.json', format: 'xlsx' }
    });
    expect(validateExportRequest(queryToBody({ table_ref: ['t.json', 'u.json'], format: 'CSV' }))).toEqual({
      ok: true,
      value: { table_ref: 't.json', format: 'csv' }
    });
    expect(validateExportRequest({ table_ref: 't.json', format: 'pdf' }).ok).toBe(false);
  });

  test('analyzeColumn: target_ref and key_column come as a pair', () => {
    expect(validateAnalyzeColumnRequest({ table_ref: 'm', column: 'FLAG' })).toEqual({
      ok: true,
      value: { table_ref: 'm', column: 'FLAG' }
    });
    expect(validateAnalyzeColumnRequest({ table_ref: 'm', column: 'FLAG', target_ref: 't', key_column: 'PN' })).toEqual({
      ok: true,
      value: { table_ref: 'm', column: 'FLAG', target_ref: 't', key_column: 'PN' }
    });
    expect(validateAnalyzeColumnRequest({ table_ref: 'm', column: 'FLAG', target_ref: 't' })).toEqual({
      ok: false,
      errorStatus: 400,
      errorBody: {
        error: 'target_ref and key_column must be given together as non-empty strings.',
        error_codes: ['E602']
      }
    });
  });
});
