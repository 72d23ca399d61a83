/**
 * Key/value cache as a container service.
 *
 * Wraps either Redis or the in-process store behind a {@link CacheGateway}.
 * An unreachable Redis never blocks startup: the gateway already reads a
 * failing store as a miss.
 */

import type { Logger } from '@quotebook/logger';
import {
  CacheGateway,
  MemoryKeyValueStore,
  RedisKeyValueStore,
  type KeyValueStore,
} from '@quotebook/range-cache';
import type { Config } from '../config/index.js';
import type { HealthStatus, Service } from '../container/types.js';

export interface CacheServiceConfig {
  logger: Logger;
  cache: Config['cache'];
  /** Store to use instead of the one `cache.type` selects */
  store?: KeyValueStore;
}

export class CacheService implements Service {
  readonly name = 'cache';
  readonly dependencies: string[] = [];
  readonly gateway: CacheGateway;

  private logger: Logger;
  private store: KeyValueStore;
  private connected = false;

  constructor(private config: CacheServiceConfig) {
    this.logger = config.logger;
    this.store = config.store ?? createStore(config.cache, this.logger);
    this.gateway = new CacheGateway(this.store, {
      ttlSeconds: config.cache.ttlSeconds,
      logger: this.logger,
    });
  }

  async initialize(): Promise<void> {
    if (this.store instanceof RedisKeyValueStore) {
      try {
        await this.store.connect();
        this.connected = true;
      } catch (error) {
        this.logger.warn('Redis unavailable, requests will bypass the cache', {
          host: this.config.cache.redis.host,
          port: this.config.cache.redis.port,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    } else {
      this.connected = true;
    }

    this.logger.info('Cache initialized', {
      type: this.store instanceof RedisKeyValueStore ? 'redis' : 'memory',
      ttl_seconds: this.gateway.ttlSeconds,
      connected: this.connected,
    });
  }

  async shutdown(): Promise<void> {
    await this.store.close();
    this.connected = false;
    this.logger.info('Cache closed');
  }

  async healthCheck(): Promise<HealthStatus> {
    if (this.store instanceof RedisKeyValueStore) {
      try {
        const ok = await this.store.ping();
        return { healthy: ok, message: ok ? 'Redis reachable' : 'Redis did not answer PING' };
      } catch (error) {
        return {
          healthy: false,
          message: error instanceof Error ? error.message : String(error),
        };
      }
    }

    const details =
      this.store instanceof MemoryKeyValueStore ? { keys: this.store.size() } : undefined;
    return { healthy: this.connected, message: 'In-process cache', details };
  }
}

function createStore(cache: Config['cache'], logger: Logger): KeyValueStore {
  if (cache.type === 'memory') {
    return new MemoryKeyValueStore(cache.maxKeys);
  }

  return new RedisKeyValueStore({
    host: cache.redis.host,
    port: cache.redis.port,
    password: cache.redis.password,
    db: cache.redis.db,
    connectTimeoutMs: cache.redis.connectTimeoutMs,
    commandTimeoutMs: cache.redis.commandTimeoutMs,
  }, logger);
}
