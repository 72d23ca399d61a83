/**
 * Manual dependency injection container implementation
 */

import type { Logger } from '@quotebook/logger';
import type {
  IContainer,
  Service,
  ServiceFactory,
  ServiceKey,
  ServiceRegistration,
  DependencyNode,
  HealthStatus,
} from './types.js';

export interface ContainerOptions {
  /** Receives shutdown failures. Without it they are rethrown together. */
  logger?: Logger;
}

/**
 * Simple dependency injection container over a typed service map.
 *
 * @example
 * ```typescript
 * interface AppServices { database: DatabaseService; cache: CacheService }
 *
 * const container = new Container<AppServices>();
 * container.register('database', () => new DatabaseService({ url, logger }));
 * await container.initializeAll();
 * container.resolve('database'); // DatabaseService
 * ```
 */
export class Container<S extends object> implements IContainer<S> {
  private instances: Partial<S> = {};
  private factories: { [K in ServiceKey<S>]?: ServiceFactory<S, K> } = {};
  private registrations = new Map<ServiceKey<S>, ServiceRegistration<S>>();
  private initialized = new Set<ServiceKey<S>>();

  constructor(private readonly options: ContainerOptions = {}) {}

  /**
   * Register a service factory
   */
  register<K extends ServiceKey<S>>(
    key: K,
    factory: ServiceFactory<S, K>,
    metadata?: Partial<Omit<ServiceRegistration<S>, 'key'>>
  ): void {
    this.factories[key] = factory;
    this.registrations.set(key, {
      key,
      name: metadata?.name ?? key,
      singleton: metadata?.singleton !== false,
      dependencies: metadata?.dependencies ?? [],
    });
  }

  /**
   * Resolve a service instance
   */
  resolve<K extends ServiceKey<S>>(key: K): S[K] {
    const existing: S[K] | undefined = this.instances[key];
    if (existing !== undefined) {
      return existing;
    }

    const factory: ServiceFactory<S, K> | undefined = this.factories[key];
    if (!factory) {
      throw new Error(`Service not registered: ${key}`);
    }

    const instance = factory(this);

    if (this.registrations.get(key)?.singleton) {
      this.instances[key] = instance;
    }

    return instance;
  }

  /**
   * Check if service is registered
   */
  has(key: ServiceKey<S>): boolean {
    return this.registrations.has(key);
  }

  /**
   * Get dependency graph for visualization
   */
  getDependencyGraph(): DependencyNode[] {
    const visited = new Set<ServiceKey<S>>();
    const nodes: DependencyNode[] = [];

    const buildNode = (key: ServiceKey<S>): DependencyNode => {
      const registration = this.registrations.get(key);
      const name = registration?.name ?? key;

      if (visited.has(key)) {
        return { name, dependencies: [], metadata: { circular: true } };
      }
      visited.add(key);

      return {
        name,
        dependencies: (registration?.dependencies ?? []).map((dep) => buildNode(dep)),
        metadata: {
          singleton: registration?.singleton,
          initialized: this.initialized.has(key),
        },
      };
    };

    for (const key of this.registrations.keys()) {
      if (!visited.has(key)) {
        nodes.push(buildNode(key));
      }
    }

    return nodes;
  }

  /**
   * Initialize every registered service, dependencies first
   */
  async initializeAll(): Promise<void> {
    const services = new Map<string, { key: ServiceKey<S>; service: Service }>();

    for (const key of this.registrations.keys()) {
      const instance = this.resolve(key);
      if (isService(instance)) {
        services.set(instance.name, { key, service: instance });
      }
    }

    const done = new Set<string>();
    const visiting = new Set<string>();

    const initialize = async (name: string): Promise<void> => {
      const entry = services.get(name);
      if (!entry || done.has(name)) {
        return;
      }
      if (visiting.has(name)) {
        throw new Error(`Circular service dependency involving: ${name}`);
      }
      visiting.add(name);

      for (const depName of entry.service.dependencies) {
        await initialize(depName);
      }

      await entry.service.initialize();
      visiting.delete(name);
      done.add(name);
      this.initialized.add(entry.key);
    };

    for (const name of services.keys()) {
      await initialize(name);
    }
  }

  /**
   * Shutdown initialized services, dependents first
   */
  async shutdownAll(): Promise<void> {
    const services: Service[] = [];
    for (const key of this.initialized) {
      const instance = this.instances[key];
      if (isService(instance)) {
        services.push(instance);
      }
    }

    const failures: Error[] = [];
    const stopped = new Set<string>();

    const shutdownService = async (service: Service): Promise<void> => {
      if (stopped.has(service.name)) {
        return;
      }
      stopped.add(service.name);

      for (const dependent of services) {
        if (dependent.dependencies.includes(service.name)) {
          await shutdownService(dependent);
        }
      }

      // One failing service must not keep the others open
      try {
        await service.shutdown();
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.options.logger?.error('Error shutting down service', {
          service: service.name,
          error: failure.message,
        });
        failures.push(failure);
      }
    };

    for (const service of services) {
      await shutdownService(service);
    }

    this.initialized.clear();

    if (failures.length > 0 && !this.options.logger) {
      throw new AggregateError(failures, `${failures.length} service(s) failed to shut down`);
    }
  }

  /**
   * Health check all initialized services
   */
  async healthCheckAll(): Promise<Map<string, HealthStatus>> {
    const results = new Map<string, HealthStatus>();

    for (const key of this.initialized) {
      const instance = this.instances[key];
      if (!isService(instance)) continue;

      try {
        const status = await instance.healthCheck();
        results.set(instance.name, { ...status, lastCheck: new Date() });
      } catch (error) {
        results.set(instance.name, {
          healthy: false,
          message: `Health check failed: ${error instanceof Error ? error.message : String(error)}`,
          lastCheck: new Date(),
        });
      }
    }

    return results;
  }

  /**
   * Get wiring graph as ASCII art
   */
  getWiringGraph(): string {
    const nodes = this.getDependencyGraph();
    const lines: string[] = ['[App Container]'];

    const renderNode = (node: DependencyNode, prefix: string, isLast: boolean) => {
      const connector = isLast ? '└─> ' : '├─> ';
      const status = node.metadata?.['initialized'] ? '✓' : '○';
      lines.push(`${prefix}${connector}[${node.name}] ${status}`);

      const childPrefix = prefix + (isLast ? '      ' : '│     ');
      node.dependencies.forEach((dep, i) => {
        renderNode(dep, childPrefix, i === node.dependencies.length - 1);
      });
    };

    nodes.forEach((node, i) => {
      renderNode(node, '  ', i === nodes.length - 1);
    });

    return lines.join('\n');
  }
}

/**
 * Type guard for Service interface
 */
export function isService(obj: unknown): obj is Service {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'name' in obj &&
    typeof obj.name === 'string' &&
    'dependencies' in obj &&
    Array.isArray(obj.dependencies) &&
    'initialize' in obj &&
    typeof obj.initialize === 'function' &&
    'shutdown' in obj &&
    typeof obj.shutdown === 'function' &&
    'healthCheck' in obj &&
    typeof obj.healthCheck === 'function'
  );
}

// Re-export types
export * from './types.js';
