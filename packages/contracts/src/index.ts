/**
 * @fileoverview Main entry point for @quotebook/contracts.
 *
 * Domain record shapes, ISO date helpers and the error taxonomy shared by
 * every package.
 *
 * @module @quotebook/contracts
 */

// Domain records
export type {
  IsoDate,
  DirectoryEntry,
  NamespaceConfig,
  NamespaceTables,
  MarketRecord,
  RangePayload,
  PriceRangeResponse,
  LatestSignalsResponse,
} from './market.js';

// Date helpers
export {
  isIsoDate,
  parseIsoDate,
  formatIsoDate,
  addDays,
  dayOfWeek,
  toIsoDate,
} from './dates.js';

// Error classes and guards
export {
  QuotebookError,
  ValidationError,
  NotFoundError,
  UpstreamUnavailableError,
  SerializationError,
  isQuotebookError,
  isValidationError,
  isNotFoundError,
  isUpstreamUnavailableError,
  isSerializationError,
} from './errors.js';

export type { ErrorCode } from './errors.js';
