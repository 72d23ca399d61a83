/**
 * Error sanitization for logs and client responses
 */

import { isQuotebookError, type ErrorCode } from '@quotebook/contracts';

export interface SanitizedError {
  message: string;
  name: string;
  stack?: string;
}

export interface ErrorResponse {
  status: number;
  body: { error: string; code: ErrorCode };
}

/**
 * Sanitizes error objects before logging to prevent sensitive information exposure.
 * Stack traces are only included in development or when asked for.
 */
export function sanitizeError(error: unknown, includeStack = false): SanitizedError {
  const isDevelopment = process.env['NODE_ENV'] === 'development';

  if (error instanceof Error) {
    const sanitized: SanitizedError = {
      message: error.message,
      name: error.name,
    };

    if ((isDevelopment || includeStack) && error.stack) {
      sanitized.stack = error.stack;
    }

    return sanitized;
  }

  return {
    message: String(error),
    name: 'Unknown',
  };
}

/**
 * HTTP status and body for an error reaching the edge of a request.
 *
 * Domain errors keep their message and status. Anything else is an internal
 * error whose details stay in the logs.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (isQuotebookError(error)) {
    return {
      status: error.httpStatus,
      body: { error: error.message, code: error.code },
    };
  }

  return {
    status: 500,
    body: { error: 'Internal server error', code: 'INTERNAL_ERROR' },
  };
}
