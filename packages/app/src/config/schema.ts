/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import type { NamespaceConfig } from '@quotebook/contracts';

/**
 * SQL identifier accepted as a table name. Table names are interpolated into
 * queries, so nothing else gets through.
 */
export const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * `true` / `false` / `1` / `0` from the environment, or a real boolean.
 */
const envBoolean = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

const namespaceSchema = z
  .object({
    name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'must be a lowercase identifier'),
    market: z.string().min(1),
  })
  .transform(
    ({ name, market }): NamespaceConfig => ({
      name,
      market,
      tables: {
        codes: `${name}_codes`,
        prices: `${name}_prices`,
        signals: `${name}_signals`,
        tradeHistory: `${name}_trade_history`,
        profits: `${name}_profits`,
        owned: `${name}_owned`,
      },
    })
  );

/**
 * Market code used when a NAMESPACES entry gives none
 */
const DEFAULT_MARKETS: Record<string, string> = {
  krx: 'KRX',
  usx: 'US',
  coin: 'COIN',
};

/**
 * `krx:KRX,usx:US,coin` → [{ name: 'krx', market: 'KRX' }, ...]
 */
function parseNamespaceList(value: unknown): unknown {
  if (typeof value !== 'string') return value;

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => {
      const [name = '', market] = item.split(':').map((part) => part.trim());
      return { name, market: market || DEFAULT_MARKETS[name] || name.toUpperCase() };
    });
}

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      name: z.string().default('Quotebook'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.coerce.number().int().min(0).max(65535).default(5000),
    })
    .default({}),

  database: z
    .object({
      url: z.string().min(1).default('sqlite:quotebook.db'),
      connectTimeoutMs: z.coerce.number().int().positive().default(5000),
      statementTimeoutMs: z.coerce.number().int().positive().default(15000),
    })
    .default({}),

  cache: z
    .object({
      type: z.enum(['memory', 'redis']).default('redis'),
      ttlSeconds: z.coerce.number().int().positive().default(300),
      singleFlight: envBoolean.default(true),
      maxKeys: z.coerce.number().int().positive().default(10000),
      redis: z
        .object({
          host: z.string().default('localhost'),
          port: z.coerce.number().int().positive().default(6379),
          password: z.string().optional(),
          db: z.coerce.number().int().min(0).default(0),
          connectTimeoutMs: z.coerce.number().int().positive().default(2000),
          commandTimeoutMs: z.coerce.number().int().positive().default(1000),
        })
        .default({}),
    })
    .default({}),

  directory: z
    .object({
      refreshIntervalMs: z.coerce.number().int().positive().default(3 * 60 * 60 * 1000),
      namespaces: z
        .preprocess(parseNamespaceList, z.array(namespaceSchema).min(1))
        .default('krx,usx,coin')
        .superRefine((namespaces, ctx) => {
          const seen = new Set<string>();
          for (const namespace of namespaces) {
            if (seen.has(namespace.name)) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `duplicate namespace '${namespace.name}'`,
              });
            }
            seen.add(namespace.name);

            for (const table of Object.values(namespace.tables)) {
              if (!TABLE_NAME_PATTERN.test(table)) {
                ctx.addIssue({
                  code: z.ZodIssueCode.custom,
                  message: `invalid table name '${table}'`,
                });
              }
            }
          }
        }),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  SERVER_HOST: 'server.host',
  SERVER_PORT: 'server.port',
  DATABASE_URL: 'database.url',
  DATABASE_CONNECT_TIMEOUT_MS: 'database.connectTimeoutMs',
  DATABASE_STATEMENT_TIMEOUT_MS: 'database.statementTimeoutMs',
  CACHE_TYPE: 'cache.type',
  CACHE_TTL_SECONDS: 'cache.ttlSeconds',
  CACHE_SINGLE_FLIGHT: 'cache.singleFlight',
  CACHE_MAX_KEYS: 'cache.maxKeys',
  REDIS_HOST: 'cache.redis.host',
  REDIS_PORT: 'cache.redis.port',
  REDIS_PASSWORD: 'cache.redis.password',
  REDIS_DB: 'cache.redis.db',
  REDIS_CONNECT_TIMEOUT_MS: 'cache.redis.connectTimeoutMs',
  REDIS_COMMAND_TIMEOUT_MS: 'cache.redis.commandTimeoutMs',
  DIRECTORY_REFRESH_INTERVAL_MS: 'directory.refreshIntervalMs',
  NAMESPACES: 'directory.namespaces',
};
