// engine/errorCodes.ts
// Canonical error codes for the BOM lookup engine.
//
// Code ranges:
//
//  E100–E199 → Validation (caller supplied a column/sheet/file that does not exist or is unusable)
//  E200–E299 → Schema (join/value columns missing from one side of the merge)
//  E300–E399 → File source/sink collaborator failures
//  E600–E699 → Transport / request structure issues (HTTP layer only)

// NOTE:
// - E1xx / E2xx are never retryable with the same input.
// - E3xx may be retried by the orchestration layer; the engine itself never retries.

export const ErrorCodes = {
  // 1xx – Validation
  COLUMN_NOT_FOUND: 'E101',
  SHEET_NOT_FOUND: 'E102',
  INVALID_TABLE_SHAPE: 'E103',
  UNSUPPORTED_FILE_TYPE: 'E104',
  INVALID_CONFIG_VALUE: 'E105',
  CORRUPT_STORED_TABLE: 'E106',

  // 2xx – Schema
  KEY_COLUMN_MISSING: 'E201',
  VALUE_COLUMN_MISSING: 'E202',

  // 3xx – Collaborators
  FILE_NOT_FOUND: 'E301',
  FILE_WRITE_FAILED: 'E302',

  // 6xx – Transport
  INVALID_JSON_BODY: 'E601',
  INVALID_REQUEST_STRUCTURE: 'E602',
  METHOD_NOT_ALLOWED: 'E603',
  INTERNAL_ENGINE_ERROR: 'E607'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Human-readable descriptions (for logs / API error bodies)
export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.COLUMN_NOT_FOUND]: 'Referenced column does not exist in the table.',
  [ErrorCodes.SHEET_NOT_FOUND]: 'Referenced sheet does not exist in the file.',
  [ErrorCodes.INVALID_TABLE_SHAPE]: 'Table rows do not share the declared column set.',
  [ErrorCodes.UNSUPPORTED_FILE_TYPE]: 'File type is not supported (use .csv or .xlsx).',
  [ErrorCodes.INVALID_CONFIG_VALUE]: 'Configuration value is missing or out of range.',
  [ErrorCodes.CORRUPT_STORED_TABLE]: 'Stored table could not be decoded.',

  [ErrorCodes.KEY_COLUMN_MISSING]: 'Key column is missing from the master or target table.',
  [ErrorCodes.VALUE_COLUMN_MISSING]: 'Value column is missing from the master or target table.',

  [ErrorCodes.FILE_NOT_FOUND]: 'File does not exist in storage.',
  [ErrorCodes.FILE_WRITE_FAILED]: 'File could not be written to storage.',

  [ErrorCodes.INVALID_JSON_BODY]: 'Request body is not valid JSON.',
  [ErrorCodes.INVALID_REQUEST_STRUCTURE]: 'Request structure is invalid.',
  [ErrorCodes.METHOD_NOT_ALLOWED]: 'HTTP method is not allowed for this endpoint.',
  [ErrorCodes.INTERNAL_ENGINE_ERROR]: 'Internal backend processing failure.'
};
