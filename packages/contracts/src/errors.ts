/**
 * @fileoverview Error taxonomy for the Quotebook query service.
 *
 * Every error raised on the request path extends {@link QuotebookError} and
 * carries a machine-readable code, the HTTP status it maps to, structured
 * context data and an ISO timestamp.
 *
 * @module @quotebook/contracts/errors
 */

/**
 * Machine-readable error codes.
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UPSTREAM_UNAVAILABLE'
  | 'SERIALIZATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base error class for all Quotebook errors.
 *
 * @example
 * ```typescript
 * throw new QuotebookError('INTERNAL_ERROR', 'Something went wrong', 500, { step: 'merge' });
 * ```
 */
export class QuotebookError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly data?: Record<string, unknown>;
  readonly timestamp: string;

  constructor(
    code: ErrorCode,
    message: string,
    httpStatus = 500,
    data?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'QuotebookError';
    this.code = code;
    this.httpStatus = httpStatus;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Missing or malformed request parameter. Maps to 400.
 *
 * @example
 * ```typescript
 * throw new ValidationError('Missing required parameter: ticker', { param: 'ticker' });
 * ```
 */
export class ValidationError extends QuotebookError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, data);
    this.name = 'ValidationError';
  }
}

/**
 * Unknown ticker, unknown market type or an empty result set. Maps to 404.
 */
export class NotFoundError extends QuotebookError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('NOT_FOUND', message, 404, data);
    this.name = 'NotFoundError';
  }
}

/**
 * Store or cache connection failure, including timeouts. Maps to 500.
 */
export class UpstreamUnavailableError extends QuotebookError {
  constructor(
    message: string,
    data: { upstream: 'store' | 'cache'; [key: string]: unknown },
    cause?: unknown
  ) {
    super('UPSTREAM_UNAVAILABLE', message, 500, data, { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * A cached value that cannot be decoded into the expected shape.
 *
 * Never reaches a client: the cache gateway logs it and treats the read as
 * a miss.
 */
export class SerializationError extends QuotebookError {
  constructor(message: string, data: { key: string; [key: string]: unknown }, cause?: unknown) {
    super('SERIALIZATION_ERROR', message, 500, data, { cause });
    this.name = 'SerializationError';
  }
}

export function isQuotebookError(error: unknown): error is QuotebookError {
  return error instanceof QuotebookError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isUpstreamUnavailableError(error: unknown): error is UpstreamUnavailableError {
  return error instanceof UpstreamUnavailableError;
}

export function isSerializationError(error: unknown): error is SerializationError {
  return error instanceof SerializationError;
}
