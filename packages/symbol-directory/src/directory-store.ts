/**
 * Ticker routing directory.
 *
 * Holds, per namespace, the codes known to the store. Each refresh builds a
 * complete new snapshot off to the side and swaps it in with a single
 * assignment, so readers see either the old or the new directory, never a
 * mix of both.
 */

import type { DirectoryEntry, NamespaceConfig } from '@quotebook/contracts';
import { startTimer } from '@quotebook/logger';
import type {
  DirectoryLogger,
  DirectorySnapshot,
  DirectorySource,
  NamespaceName,
  RefreshResult,
} from './types.js';

export interface DirectoryState {
  snapshot: DirectorySnapshot;
  /** code → first namespace (in configured order) that lists it */
  index: ReadonlyMap<string, NamespaceName>;
}

const silentLogger: DirectoryLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Drop repeated codes within a namespace, keeping the first row.
 */
function uniqueByCode(entries: DirectoryEntry[]): DirectoryEntry[] {
  const seen = new Set<string>();
  const result: DirectoryEntry[] = [];
  for (const entry of entries) {
    if (seen.has(entry.code)) continue;
    seen.add(entry.code);
    result.push(Object.freeze({ ...entry }));
  }
  return result;
}

/**
 * Build the frozen snapshot and its lookup index.
 *
 * Namespaces are indexed in configured order and an existing index entry is
 * never overwritten, so the first namespace listing a code wins.
 */
export function buildDirectoryState(
  namespaces: readonly NamespaceConfig[],
  fetched: ReadonlyMap<NamespaceName, DirectoryEntry[]>,
  loadedAt: Date = new Date()
): DirectoryState {
  const entries: Record<NamespaceName, readonly DirectoryEntry[]> = {};
  const index = new Map<string, NamespaceName>();

  for (const namespace of namespaces) {
    const unique = Object.freeze(uniqueByCode(fetched.get(namespace.name) ?? []));
    entries[namespace.name] = unique;

    for (const entry of unique) {
      if (!index.has(entry.code)) {
        index.set(entry.code, namespace.name);
      }
    }
  }

  const snapshot: DirectorySnapshot = Object.freeze({
    loadedAt: loadedAt.toISOString(),
    namespaces: Object.freeze(namespaces.map((namespace) => namespace.name)),
    entries: Object.freeze(entries),
  });

  return { snapshot, index };
}

export interface DirectoryStoreOptions {
  namespaces: readonly NamespaceConfig[];
  source: DirectorySource;
  logger?: DirectoryLogger;
}

/**
 * @example
 * ```typescript
 * const directory = new DirectoryStore({ namespaces, source, logger });
 * await directory.refresh();
 * directory.findNamespace('005930'); // → 'krx'
 * ```
 */
export class DirectoryStore {
  private readonly namespaces: readonly NamespaceConfig[];
  private readonly source: DirectorySource;
  private readonly logger: DirectoryLogger;
  private state: DirectoryState | null = null;
  private inflight: Promise<RefreshResult> | null = null;

  constructor(options: DirectoryStoreOptions) {
    this.namespaces = options.namespaces;
    this.source = options.source;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Reload every namespace and swap the new snapshot in.
   *
   * Never throws. Concurrent callers share the refresh already in flight.
   */
  refresh(): Promise<RefreshResult> {
    if (this.inflight) {
      return this.inflight;
    }

    this.inflight = this.load().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private async load(): Promise<RefreshResult> {
    const timer = startTimer();

    try {
      const results = await Promise.all(
        this.namespaces.map(async (namespace) => {
          const entries = await this.source.fetchEntries(namespace);
          return [namespace.name, entries] as const;
        })
      );

      const next = buildDirectoryState(this.namespaces, new Map(results));
      this.state = next;

      const durationMs = timer.stop();
      this.logger.info('Directory refreshed', {
        duration_ms: durationMs,
        counts: Object.fromEntries(
          next.snapshot.namespaces.map((name) => [name, next.snapshot.entries[name]?.length ?? 0])
        ),
      });

      return { ok: true, snapshot: next.snapshot, durationMs };
    } catch (err) {
      const error = toError(err);
      const durationMs = timer.stop();
      this.logger.error('Directory refresh failed, keeping previous snapshot', {
        duration_ms: durationMs,
        error: error.message,
        loaded_at: this.state?.snapshot.loadedAt ?? null,
      });
      return { ok: false, error, durationMs };
    }
  }

  /**
   * Namespace holding `code`, searched in configured order.
   *
   * @returns null when no namespace lists the code or nothing is loaded yet
   */
  findNamespace(code: string): NamespaceName | null {
    return this.state?.index.get(code) ?? null;
  }

  getSnapshot(): DirectorySnapshot | null {
    return this.state?.snapshot ?? null;
  }

  isLoaded(): boolean {
    return this.state !== null;
  }
}
