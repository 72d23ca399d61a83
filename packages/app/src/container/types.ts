/**
 * Core types for dependency injection container
 */

/**
 * Base service interface for everything with a lifecycle
 */
export interface Service {
  readonly name: string;
  /** Names of services that must initialize first */
  readonly dependencies: readonly string[];
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  healthCheck(): HealthStatus | Promise<HealthStatus>;
}

/**
 * Health status for service health checks
 */
export interface HealthStatus {
  healthy: boolean;
  message?: string;
  details?: Record<string, unknown>;
  lastCheck?: Date;
}

/**
 * Dependency node for visualization
 */
export interface DependencyNode {
  name: string;
  dependencies: DependencyNode[];
  metadata?: Record<string, unknown>;
}

/**
 * Registry keys of a service map, e.g. `'database' | 'cache'`
 */
export type ServiceKey<S> = keyof S & string;

/**
 * Builds one entry of the service map. Receives the container so it can
 * resolve what it depends on.
 */
export type ServiceFactory<S, K extends ServiceKey<S>> = (container: IContainer<S>) => S[K];

/**
 * Service registration metadata
 */
export interface ServiceRegistration<S> {
  key: ServiceKey<S>;
  name: string;
  singleton: boolean;
  dependencies: ServiceKey<S>[];
}

/**
 * Container interface for service registration and resolution
 */
export interface IContainer<S> {
  register<K extends ServiceKey<S>>(
    key: K,
    factory: ServiceFactory<S, K>,
    metadata?: Partial<Omit<ServiceRegistration<S>, 'key'>>
  ): void;
  resolve<K extends ServiceKey<S>>(key: K): S[K];
  has(key: ServiceKey<S>): boolean;
  getDependencyGraph(): DependencyNode[];
  getWiringGraph(): string;
  initializeAll(): Promise<void>;
  shutdownAll(): Promise<void>;
  healthCheckAll(): Promise<Map<string, HealthStatus>>;
}
