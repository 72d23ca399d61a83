/**
 * Redis-backed key/value store over ioredis.
 */

import { Redis } from 'ioredis';
import type { CacheLogger } from './gateway.js';
import type { KeyValueStore } from './kv-store.js';

export interface RedisStoreOptions {
  host: string;
  port: number;
  password?: string;
  db?: number;
  /** Milliseconds to establish the connection */
  connectTimeoutMs?: number;
  /** Milliseconds a single GET / SETEX may take */
  commandTimeoutMs?: number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 2000;
const DEFAULT_COMMAND_TIMEOUT_MS = 1000;

/**
 * Every command is bounded by `commandTimeout` and retried at most once, so a
 * Redis outage surfaces as a rejected promise the gateway turns into a miss.
 */
export class RedisKeyValueStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(options: RedisStoreOptions, logger?: Pick<CacheLogger, 'warn'>);
  constructor(client: Redis, logger?: Pick<CacheLogger, 'warn'>);
  constructor(optionsOrClient: RedisStoreOptions | Redis, logger?: Pick<CacheLogger, 'warn'>) {
    this.client =
      optionsOrClient instanceof Redis
        ? optionsOrClient
        : new Redis({
            host: optionsOrClient.host,
            port: optionsOrClient.port,
            password: optionsOrClient.password,
            db: optionsOrClient.db ?? 0,
            connectTimeout: optionsOrClient.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
            commandTimeout: optionsOrClient.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
            maxRetriesPerRequest: 1,
            lazyConnect: true,
          });

    // ioredis emits 'error' on every failed reconnect; unhandled it would crash the process
    this.client.on('error', (error: Error) => {
      logger?.warn('Redis connection error', { error: error.message });
    });
  }

  /**
   * Open the connection. Without it the first command connects lazily.
   */
  async connect(): Promise<void> {
    if (this.client.status === 'wait') {
      await this.client.connect();
    }
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
    await this.client.setex(key, ttlSeconds, value);
  }

  async ping(): Promise<boolean> {
    return (await this.client.ping()) === 'PONG';
  }

  async close(): Promise<void> {
    if (this.client.status === 'end') return;
    await this.client.quit();
  }
}
