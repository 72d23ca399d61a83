/**
 * Service wiring shared by the process entry point and the tests
 */

import type { Logger } from '@quotebook/logger';
import type { MarketCalendar } from '@quotebook/market-calendar';
import type { KeyValueStore } from '@quotebook/range-cache';
import type { Config } from './config/index.js';
import { Container } from './container/index.js';
import { CacheService } from './services/cache.service.js';
import { DatabaseService } from './services/database.service.js';
import { DirectoryService } from './services/directory.service.js';
import { MarketStore } from './services/market-store.js';
import { QueryDispatcher } from './services/query-dispatcher.js';

/**
 * Everything the container builds, by registry key
 */
export interface AppServices {
  database: DatabaseService;
  cache: CacheService;
  marketStore: MarketStore;
  directory: DirectoryService;
  dispatcher: QueryDispatcher;
}

export interface CreateContainerOptions {
  /** Replaces the store `cache.type` selects */
  cacheStore?: KeyValueStore;
  calendar?: MarketCalendar;
}

/**
 * Register all services in a new container. Nothing connects until
 * `initializeAll()`.
 */
export function createContainer(
  config: Config,
  logger: Logger,
  options: CreateContainerOptions = {}
): Container<AppServices> {
  const container = new Container<AppServices>({ logger });

  container.register(
    'database',
    () =>
      new DatabaseService({
        logger: logger.child({ service: 'database' }),
        url: config.database.url,
        connectTimeoutMs: config.database.connectTimeoutMs,
        statementTimeoutMs: config.database.statementTimeoutMs,
      })
  );

  container.register(
    'cache',
    () =>
      new CacheService({
        logger: logger.child({ service: 'cache' }),
        cache: config.cache,
        store: options.cacheStore,
      })
  );

  container.register(
    'marketStore',
    (c) => new MarketStore(c.resolve('database'), logger.child({ service: 'market-store' })),
    { dependencies: ['database'] }
  );

  container.register(
    'directory',
    (c) =>
      new DirectoryService({
        logger: logger.child({ service: 'directory' }),
        namespaces: config.directory.namespaces,
        source: c.resolve('marketStore'),
        refreshIntervalMs: config.directory.refreshIntervalMs,
      }),
    { dependencies: ['marketStore'] }
  );

  container.register(
    'dispatcher',
    (c) =>
      new QueryDispatcher({
        logger: logger.child({ service: 'dispatcher' }),
        namespaces: config.directory.namespaces,
        directory: c.resolve('directory').store,
        store: c.resolve('marketStore'),
        cache: c.resolve('cache').gateway,
        calendar: options.calendar,
        singleFlight: config.cache.singleFlight,
      }),
    { dependencies: ['directory', 'marketStore', 'cache'] }
  );

  return container;
}
