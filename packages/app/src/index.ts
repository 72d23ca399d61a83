/**
 * Main exports for @quotebook/app package
 */

// Container exports
export { Container, isService } from './container/index.js';
export type {
  Service,
  HealthStatus,
  IContainer,
  DependencyNode,
  ServiceFactory,
  ServiceKey,
  ServiceRegistration,
} from './container/types.js';

// Wiring
export { createContainer } from './app.js';
export type { AppServices, CreateContainerOptions } from './app.js';

// Configuration exports
export { loadConfig, getConfigSummary } from './config/index.js';
export type { Config } from './config/schema.js';

// Service exports
export { DatabaseService } from './services/database.service.js';
export type { Queryable } from './services/database.service.js';
export { CacheService } from './services/cache.service.js';
export { DirectoryService } from './services/directory.service.js';
export { MarketStore, normalizeRow } from './services/market-store.js';
export type { StoreRecord, LatestUpdate } from './services/market-store.js';
export { QueryDispatcher } from './services/query-dispatcher.js';
export type {
  PriceQuery,
  TickerRecordResponse,
  TablesResponse,
  RefreshResponse,
} from './services/query-dispatcher.js';

// HTTP
export { HttpServer } from './server/http-server.js';
export type { HttpServerConfig, HealthSource } from './server/http-server.js';
