/**
 * Core types for the ticker routing directory
 */

import type { DirectoryEntry, NamespaceConfig } from '@quotebook/contracts';

/**
 * Namespace name, e.g. 'krx'
 */
export type NamespaceName = string;

/**
 * Where directory entries come from. The app implements this over each
 * namespace's codes table.
 */
export interface DirectorySource {
  fetchEntries(namespace: NamespaceConfig): Promise<DirectoryEntry[]>;
}

/**
 * A complete, frozen view of the directory as of one refresh.
 */
export interface DirectorySnapshot {
  /** ISO timestamp of the refresh that built this snapshot */
  readonly loadedAt: string;

  /** Namespace names in configured (lookup) order */
  readonly namespaces: readonly NamespaceName[];

  readonly entries: Readonly<Record<NamespaceName, readonly DirectoryEntry[]>>;
}

/**
 * Outcome of a refresh. A failed refresh leaves the previous snapshot in place.
 */
export type RefreshResult =
  | { ok: true; snapshot: DirectorySnapshot; durationMs: number }
  | { ok: false; error: Error; durationMs: number };

/**
 * Logging surface the directory needs; a winston logger satisfies it.
 */
export interface DirectoryLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
