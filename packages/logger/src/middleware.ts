/**
 * @fileoverview Request ID injection for HTTP handlers and background jobs.
 */

import { withRequestContext, generateRequestId } from './request-context.js';

/**
 * Minimal request / response shapes so this package does not depend on
 * Express. Express's own types satisfy them structurally.
 */
export interface RequestLike {
  headers: Record<string, string | string[] | undefined>;
}

export interface ResponseLike {
  setHeader(name: string, value: string): unknown;
}

export type NextFunction = (error?: unknown) => void;

/**
 * Longest client-supplied request ID accepted verbatim.
 */
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Express middleware: takes `X-Request-ID` from the request (or generates
 * one), echoes it on the response and runs the rest of the chain inside a
 * request context.
 *
 * @example
 * ```typescript
 * app.use(requestIdMiddleware());
 * ```
 */
export function requestIdMiddleware() {
  return (req: RequestLike, res: ResponseLike, next: NextFunction): void => {
    const existingId = req.headers['x-request-id'];
    const requestId =
      typeof existingId === 'string' && existingId.length > 0 && existingId.length <= MAX_REQUEST_ID_LENGTH
        ? existingId
        : generateRequestId();

    res.setHeader('X-Request-ID', requestId);

    withRequestContext(() => next(), requestId).catch((error: unknown) => {
      next(error);
    });
  };
}

/**
 * Wrap a scheduled job so each run gets its own request context.
 *
 * @example
 * ```typescript
 * const runRefresh = withJobRequestContext('directory-refresh');
 * await runRefresh(() => directory.refresh());
 * ```
 */
export function withJobRequestContext(jobName: string, metadata?: Record<string, unknown>) {
  return async <T>(fn: () => Promise<T>): Promise<T> => {
    return withRequestContext(() => fn(), generateRequestId(), {
      context: 'job',
      job_name: jobName,
      ...metadata,
    });
  };
}
