// engine/validateRequest.ts
// Transport-level validation for the BOM ETL endpoints.
//
// Responsibilities:
//  - Parse the JSON body (string or pre-parsed object)
//  - Check presence and primitive type of every field an endpoint reads
//  - Do NOT check columns, sheets or files (the engine does that)

import { ErrorCodes, type ErrorCode } from './errorCodes';
import type { ExportFormat } from './etlService';

export interface ErrorBody {
  error: string;
  error_codes: ErrorCode[];
  retryable?: boolean;
  details?: Record<string, unknown>;
}

export type RequestValidation<T> =
  | { ok: true; value: T }
  | { ok: false; errorStatus: number; errorBody: ErrorBody };

type Body = Record<string, unknown>;

function reject(error: string, code: ErrorCode = ErrorCodes.INVALID_REQUEST_STRUCTURE): { ok: false; errorStatus: number; errorBody: ErrorBody } {
  return { ok: false, errorStatus: 400, errorBody: { error, error_codes: [code] } };
}

function isPlainObject(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// -----------------------------------------
// Field readers (undefined = absent or wrong type)
// -----------------------------------------

function readString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  return value;
}

function readStringArray(body: Body, field: string): string[] | undefined {
  const value = body[field];
  if (!Array.isArray(value)) return undefined;
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return undefined;
    out.push(item);
  }
  return out;
}

function readCount(body: Body, field: string): number | undefined {
  const value = body[field];
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isInteger(n) && n >= 0 ? n : undefined;
}

function readFlag(body: Body, field: string): boolean | undefined {
  const value = body[field];
  return typeof value === 'boolean' ? value : undefined;
}

// -----------------------------------------
// Body / query entry
// -----------------------------------------

/**
 * Vercel hands over either a parsed object or the raw string.
 */
export function parseJsonBody(raw: unknown): RequestValidation<Body> {
  let body: unknown = raw;
  if (typeof raw === 'string') {
    try {
      body = JSON.parse(raw);
    } catch {
      return reject('Request body is not valid JSON.', ErrorCodes.INVALID_JSON_BODY);
    }
  }
  if (!isPlainObject(body)) {
    return reject('Invalid request structure.');
  }
  return { ok: true, value: body };
}

/** Flatten a Vercel query object (first value wins for repeated keys). */
export function queryToBody(query: Record<string, string | string[] | undefined>): Body {
  const body: Body = {};
  for (const [key, value] of Object.entries(query)) {
    body[key] = Array.isArray(value) ? value[0] : value;
  }
  return body;
}

// -----------------------------------------
// Endpoint requests
// -----------------------------------------

export interface SheetsRequest {
  file_ref: string;
  preview_rows?: number;
}

export function validateSheetsRequest(body: Body): RequestValidation<SheetsRequest> {
  const file_ref = readString(body, 'file_ref');
  if (!file_ref) return reject('file_ref is required and must be a non-empty string.');

  if (body.preview_rows !== undefined && readCount(body, 'preview_rows') === undefined) {
    return reject('preview_rows must be a non-negative integer.');
  }
  return { ok: true, value: { file_ref, preview_rows: readCount(body, 'preview_rows') } };
}

export interface CleanRequest {
  file_ref: string;
  sheet: string;
  key_column: string;
  text_columns?: string[];
  move_key_first?: boolean;
}

export function validateCleanRequest(body: Body): RequestValidation<CleanRequest> {
  const file_ref = readString(body, 'file_ref');
  const sheet = readString(body, 'sheet');
  const key_column = readString(body, 'key_column');
  if (!file_ref || !sheet || !key_column) {
    return reject('file_ref, sheet and key_column are required strings.');
  }

  const text_columns = readStringArray(body, 'text_columns');
  if (body.text_columns !== undefined && !text_columns) {
    return reject('text_columns must be an array of strings.');
  }
  const move_key_first = readFlag(body, 'move_key_first');
  if (body.move_key_first !== undefined && move_key_first === undefined) {
    return reject('move_key_first must be a boolean.');
  }

  return { ok: true, value: { file_ref, sheet, key_column, text_columns, move_key_first } };
}

export interface SuggestColumnRequest {
  header: string;
  candidates: string[];
  limit?: number;
}

export function validateSuggestColumnRequest(body: Body): RequestValidation<SuggestColumnRequest> {
  const header = readString(body, 'header');
  if (!header) return reject('header is required and must be a non-empty string.');

  const candidates = readStringArray(body, 'candidates');
  if (!candidates) return reject('candidates must be an array of strings.');

  const limit = readCount(body, 'limit');
  if (body.limit !== undefined && limit === undefined) {
    return reject('limit must be a non-negative integer.');
  }
  return { ok: true, value: { header, candidates, limit } };
}

export interface TableRefRequest {
  table_ref: string;
}

export function validateTableRefRequest(body: Body): RequestValidation<TableRefRequest> {
  const table_ref = readString(body, 'table_ref');
  if (!table_ref) return reject('table_ref is required and must be a non-empty string.');
  return { ok: true, value: { table_ref } };
}

export interface LookupRequest {
  master_ref: string;
  target_ref: string;
  key_column: string;
  value_columns: string[];
}

/** Shared by /api/lookup, /api/processUpdates and /api/previewUpdates. */
export function validateLookupRequest(body: Body): RequestValidation<LookupRequest> {
  const master_ref = readString(body, 'master_ref');
  const target_ref = readString(body, 'target_ref');
  const key_column = readString(body, 'key_column');
  if (!master_ref || !target_ref || !key_column) {
    return reject('master_ref, target_ref and key_column are required strings.');
  }

  const value_columns = readStringArray(body, 'value_columns');
  if (!value_columns) return reject('value_columns must be an array of strings.');

  return { ok: true, value: { master_ref, target_ref, key_column, value_columns } };
}

export interface ExportRequest {
  table_ref: string;
  format: ExportFormat;
}

export function validateExportRequest(body: Body): RequestValidation<ExportRequest> {
  const table_ref = readString(body, 'table_ref');
  if (!table_ref) return reject('table_ref is required and must be a non-empty string.');

  const rawFormat = readString(body, 'format') ?? 'xlsx';
  const format = rawFormat.trim().toLowerCase();
  if (format !== 'csv' && format !== 'xlsx') {
    return reject('format must be "csv" or "xlsx".');
  }
  return { ok: true, value: { table_ref, format } };
}

export interface AnalyzeColumnRequest {
  table_ref: string;
  column: string;
  /** With key_column: profile only master rows this target never references. */
  target_ref?: string;
  key_column?: string;
}

export function validateAnalyzeColumnRequest(body: Body): RequestValidation<AnalyzeColumnRequest> {
  const table_ref = readString(body, 'table_ref');
  const column = readString(body, 'column');
  if (!table_ref || !column) {
    return reject('table_ref and column are required strings.');
  }

  if (body.target_ref === undefined && body.key_column === undefined) {
    return { ok: true, value: { table_ref, column } };
  }
  const target_ref = readString(body, 'target_ref');
  const key_column = readString(body, 'key_column');
  if (!target_ref || !key_column) {
    return reject('target_ref and key_column must be given together as non-empty strings.');
  }
  return { ok: true, value: { table_ref, column, target_ref, key_column } };
}
