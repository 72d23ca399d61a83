/**
 * Shared fixtures for the app tests: silent logger, test configuration and
 * an in-memory SQLite store seeded from tests/fixtures.
 */

import { readFileSync } from 'node:fs';
import winston from 'winston';
import { createLogger, type Logger } from '@quotebook/logger';
import { MemoryKeyValueStore, type KeyValueStore } from '@quotebook/range-cache';
import { createContainer, type AppServices } from '../src/app.js';
import { loadConfig, type Config } from '../src/config/index.js';
import type { Container } from '../src/container/index.js';
import { DatabaseService } from '../src/services/database.service.js';

function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

export function createSilentLogger(): Logger {
  const logger = createLogger({ level: 'error', console: false });
  logger.add(new winston.transports.Console({ silent: true }));
  return logger;
}

export function testConfig(env: Record<string, string> = {}): Config {
  return loadConfig({
    NODE_ENV: 'test',
    DATABASE_URL: 'sqlite::memory:',
    CACHE_TYPE: 'memory',
    NAMESPACES: 'krx:KRX,usx:US',
    ...env,
  });
}

/**
 * Connect `database` and load the schema and seed rows into it
 */
export async function seedDatabase(database: DatabaseService): Promise<void> {
  await database.initialize();
  await database.connection.execScript(fixture('schema.sql'));
  await database.connection.execScript(fixture('seed.sql'));
}

export async function createSeededDatabase(logger: Logger): Promise<DatabaseService> {
  const database = new DatabaseService({ logger, url: 'sqlite::memory:' });
  await seedDatabase(database);
  return database;
}

export interface TestApp<T extends KeyValueStore = MemoryKeyValueStore> {
  container: Container<AppServices>;
  cacheStore: T;
}

/**
 * Fully initialized container over a seeded database and an in-memory cache
 */
export async function createTestApp(env: Record<string, string> = {}): Promise<TestApp> {
  return createTestAppWithStore(new MemoryKeyValueStore(), env);
}

export async function createTestAppWithStore<T extends KeyValueStore>(
  cacheStore: T,
  env: Record<string, string> = {}
): Promise<TestApp<T>> {
  const container = createContainer(testConfig(env), createSilentLogger(), { cacheStore });

  await seedDatabase(container.resolve('database'));
  await container.initializeAll();

  return { container, cacheStore };
}
