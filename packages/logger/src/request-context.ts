/**
 * @fileoverview Request context propagation through AsyncLocalStorage.
 *
 * Every HTTP request and every background directory refresh runs inside a
 * context so log lines emitted anywhere below it carry the same request_id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** Unique request identifier (UUID v4 unless supplied by the caller) */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Request ID of the active context, or undefined outside of one.
 */
export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Run `fn` inside a new request context.
 *
 * @example
 * ```typescript
 * await withRequestContext(() => directory.refresh(), undefined, { job_name: 'directory-refresh' });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId || generateRequestId(),
  };

  return requestContextStorage.run(context, fn);
}
