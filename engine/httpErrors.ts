// engine/httpErrors.ts
// Thrown value → HTTP status + JSON error body.

import { ErrorCodeDescriptions, ErrorCodes } from './errorCodes';
import { httpStatusForError, isEtlError } from './errors';
import { describeError, logError, logWarn } from './logger';
import type { ErrorBody } from './validateRequest';

export interface ErrorResponse {
  status: number;
  body: ErrorBody;
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (isEtlError(err)) {
    return {
      status: httpStatusForError(err),
      body: {
        error: err.message,
        error_codes: [err.code],
        retryable: err.retryable,
        details: err.details
      }
    };
  }

  // Internal details stay in the logs.
  return {
    status: 500,
    body: {
      error: ErrorCodeDescriptions[ErrorCodes.INTERNAL_ENGINE_ERROR],
      error_codes: [ErrorCodes.INTERNAL_ENGINE_ERROR],
      retryable: false
    }
  };
}

export function methodNotAllowed(allowed: string): ErrorResponse {
  return {
    status: 405,
    body: {
      error: `Method not allowed. Use ${allowed}.`,
      error_codes: [ErrorCodes.METHOD_NOT_ALLOWED]
    }
  };
}

/**
 * Map a failure of `endpoint` and log it: warn for expected engine errors,
 * error for everything that ends up as a 500.
 */
export function logAndMapError(endpoint: string, err: unknown): ErrorResponse {
  const response = toErrorResponse(err);
  const ctx = {
    endpoint,
    status: response.status,
    error_codes: response.body.error_codes,
    ...describeError(err)
  };
  if (response.status >= 500) {
    logError('request_failed', ctx);
  } else {
    logWarn('request_rejected', ctx);
  }
  return response;
}
