// engine/errors.ts
// Error taxonomy surfaced by the engine and its collaborators.

import { ErrorCodes, type ErrorCode } from './errorCodes';

export type EtlErrorKind = 'validation' | 'schema' | 'not_found' | 'write';

export interface EtlErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every expected engine failure.
 * Anything that is not an EtlError reaching a handler is an internal error (E607).
 */
export abstract class EtlError extends Error {
  abstract readonly kind: EtlErrorKind;
  abstract readonly retryable: boolean;
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  protected constructor(code: ErrorCode, message: string, options: EtlErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    this.details = options.details ?? {};
  }
}

/** Referenced column/sheet/file does not exist or cannot be used. */
export class ValidationError extends EtlError {
  readonly kind = 'validation';
  readonly retryable = false;
  override readonly name = 'ValidationError';

  constructor(code: ErrorCode, message: string, options?: EtlErrorOptions) {
    super(code, message, options);
  }
}

/** Join or value columns missing from one side of the merge. */
export class SchemaError extends EtlError {
  readonly kind = 'schema';
  readonly retryable = false;
  override readonly name = 'SchemaError';

  constructor(code: ErrorCode, message: string, options?: EtlErrorOptions) {
    super(code, message, options);
  }
}

export class NotFoundError extends EtlError {
  readonly kind = 'not_found';
  readonly retryable = true;
  override readonly name = 'NotFoundError';

  constructor(identifier: string, options?: EtlErrorOptions) {
    super(ErrorCodes.FILE_NOT_FOUND, `File "${identifier}" was not found.`, {
      ...options,
      details: { identifier, ...options?.details }
    });
  }
}

export class WriteError extends EtlError {
  readonly kind = 'write';
  readonly retryable = true;
  override readonly name = 'WriteError';

  constructor(identifier: string, reason: string, options?: EtlErrorOptions) {
    super(ErrorCodes.FILE_WRITE_FAILED, `File "${identifier}" could not be stored: ${reason}`, {
      ...options,
      details: { identifier, ...options?.details }
    });
  }
}

export function isEtlError(err: unknown): err is EtlError {
  return err instanceof EtlError;
}

export function httpStatusForError(err: EtlError): number {
  switch (err.kind) {
    case 'validation':
    case 'schema':
      return 400;
    case 'not_found':
      return 404;
    case 'write':
      return 502;
  }
}
