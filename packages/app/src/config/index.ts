/**
 * Configuration loading and management
 */

import { maskUrlCredentials, type Logger } from '@quotebook/logger';
import { configSchema, envMapping, type Config } from './schema.js';

type Environment = Record<string, string | undefined>;

/**
 * Load configuration from environment and defaults.
 *
 * Values stay strings here; the schema coerces numbers and booleans per
 * field, so a numeric REDIS_PASSWORD remains a string.
 */
export function loadConfig(env: Environment = process.env, logger?: Logger): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i];
    if (!key) continue;
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    server: `${config.server.host}:${config.server.port}`,
    database: maskUrlCredentials(config.database.url),
    cache: {
      type: config.cache.type,
      ttl_seconds: config.cache.ttlSeconds,
      single_flight: config.cache.singleFlight,
    },
    directory: {
      namespaces: config.directory.namespaces.map((namespace) => namespace.name),
      refresh_interval_ms: config.directory.refreshIntervalMs,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping, TABLE_NAME_PATTERN } from './schema.js';
