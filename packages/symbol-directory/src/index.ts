/**
 * @quotebook/symbol-directory
 *
 * Ticker → namespace routing directory with atomic snapshot refresh
 *
 * @example
 * ```typescript
 * import { DirectoryStore, RefreshScheduler } from '@quotebook/symbol-directory';
 *
 * const directory = new DirectoryStore({ namespaces, source, logger });
 * await directory.refresh();
 * new RefreshScheduler(directory, { logger }).start();
 *
 * directory.findNamespace('AAPL'); // → 'usx'
 * ```
 */

export type {
  DirectoryLogger,
  DirectorySnapshot,
  DirectorySource,
  NamespaceName,
  RefreshResult,
} from './types.js';

export { DirectoryStore, buildDirectoryState } from './directory-store.js';
export type { DirectoryStoreOptions, DirectoryState } from './directory-store.js';

export { RefreshScheduler, DEFAULT_REFRESH_INTERVAL_MS } from './scheduler.js';
export type { RefreshSchedulerOptions } from './scheduler.js';
