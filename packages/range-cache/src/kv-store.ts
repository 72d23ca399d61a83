/**
 * Key/value stores the cache gateway writes through.
 */

/**
 * Minimal key/value collaborator with per-key expiry.
 */
export interface KeyValueStore {
  /** Stored string, or null when absent or expired */
  get(key: string): Promise<string | null>;

  /** Store `value` under `key` for `ttlSeconds`, replacing any existing value */
  setex(key: string, ttlSeconds: number, value: string): Promise<void>;

  close(): Promise<void>;
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/**
 * Default maximum number of keys kept in memory.
 */
const DEFAULT_MAX_KEYS = 10000;

/**
 * In-process key/value store with expiry and LRU eviction.
 *
 * Used for tests and single-process deployments (`CACHE_TYPE=memory`).
 *
 * @example
 * ```typescript
 * const store = new MemoryKeyValueStore();
 * await store.setex('quotebook:signals:AAPL', 300, '{"code":"AAPL","data":[]}');
 * ```
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private entries = new Map<string, MemoryEntry>();

  constructor(
    private readonly maxKeys: number = DEFAULT_MAX_KEYS,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return null;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }

    // Move to end (LRU: most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
    this.entries.delete(key);

    if (this.entries.size >= this.maxKeys) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) {
        this.entries.delete(oldest);
      }
    }

    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
