/**
 * Cache-aside gateway over a key/value store.
 *
 * Values are JSON. Reads validate the decoded value before handing it out.
 * Nothing here ever fails a request: a store error or an undecodable value
 * reads as a miss, and a failed write is logged and dropped.
 */

import { SerializationError } from '@quotebook/contracts';
import type { KeyValueStore } from './kv-store.js';

/**
 * Uniform expiry for every cached entity.
 */
export const CACHE_TTL_SECONDS = 300;

export type CacheValidator<T> = (value: unknown) => value is T;

/**
 * Logging surface the gateway needs; a winston logger satisfies it.
 */
export interface CacheLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

export interface CacheGatewayOptions {
  ttlSeconds?: number;
  logger?: CacheLogger;
}

const silentLogger: CacheLogger = {
  debug: () => {},
  warn: () => {},
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @example
 * ```typescript
 * const cache = new CacheGateway(new MemoryKeyValueStore(), { logger });
 * const cached = await cache.get(pricesKey('AAPL'), isRangePayload);
 * if (cached === null) {
 *   await cache.set(pricesKey('AAPL'), payload);
 * }
 * ```
 */
export class CacheGateway {
  readonly ttlSeconds: number;
  private readonly logger: CacheLogger;

  constructor(
    private readonly store: KeyValueStore,
    options: CacheGatewayOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? CACHE_TTL_SECONDS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Decoded value under `key`, or null on a miss, a store failure or a value
   * that does not decode into the shape `validate` accepts.
   */
  async get<T>(key: string, validate: CacheValidator<T>): Promise<T | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      this.logger.warn('Cache read failed, treating as miss', {
        cache_key: key,
        error: errorMessage(error),
      });
      return null;
    }

    if (raw === null) {
      this.logger.debug('Cache lookup', { cache_key: key, cache: 'miss' });
      return null;
    }

    const decoded = this.decode(key, raw, validate);
    if (decoded instanceof SerializationError) {
      this.logger.warn('Discarding unreadable cache value', {
        cache_key: key,
        error: decoded.message,
        cause: errorMessage(decoded.cause),
      });
      return null;
    }

    this.logger.debug('Cache lookup', { cache_key: key, cache: 'hit' });
    return decoded;
  }

  /**
   * Store `value` under `key` with the gateway TTL, replacing any previous
   * value (last writer wins).
   */
  async set(key: string, value: unknown): Promise<void> {
    let encoded: string;
    try {
      encoded = JSON.stringify(value);
    } catch (error) {
      this.logger.warn('Cache value not serializable, skipping write', {
        cache_key: key,
        error: errorMessage(error),
      });
      return;
    }

    try {
      await this.store.setex(key, this.ttlSeconds, encoded);
      this.logger.debug('Cache write', { cache_key: key, ttl_seconds: this.ttlSeconds });
    } catch (error) {
      this.logger.warn('Cache write failed', { cache_key: key, error: errorMessage(error) });
    }
  }

  private decode<T>(key: string, raw: string, validate: CacheValidator<T>): T | SerializationError {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return new SerializationError('Cached value is not valid JSON', { key }, error);
    }

    if (!validate(parsed)) {
      return new SerializationError('Cached value has an unexpected shape', { key }, 'validation failed');
    }
    return parsed;
  }
}
