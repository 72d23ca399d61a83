/**
 * @fileoverview Public API of @quotebook/logger.
 */

export { createLogger } from './createLogger.js';

export { attachGlobalHandlers, gracefulExit } from './errorHandler.js';

export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
} from './request-context.js';

export { startTimer } from './perf-timer.js';

export { isSensitiveFieldName, maskUrlCredentials, redactValue } from './formats.js';

export { requestIdMiddleware, withJobRequestContext } from './middleware.js';

export type { Logger, LoggerConfig, LogLevel } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
export type { RequestLike, ResponseLike, NextFunction } from './middleware.js';
