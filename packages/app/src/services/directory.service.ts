/**
 * Ticker routing directory and its periodic refresh as a container service
 */

import type { NamespaceConfig } from '@quotebook/contracts';
import type { Logger } from '@quotebook/logger';
import {
  DirectoryStore,
  RefreshScheduler,
  type DirectorySource,
} from '@quotebook/symbol-directory';
import type { HealthStatus, Service } from '../container/types.js';

export interface DirectoryServiceConfig {
  logger: Logger;
  namespaces: readonly NamespaceConfig[];
  source: DirectorySource;
  refreshIntervalMs: number;
}

export class DirectoryService implements Service {
  readonly name = 'directory';
  readonly dependencies = ['database'];
  readonly store: DirectoryStore;

  private logger: Logger;
  private scheduler: RefreshScheduler;

  constructor(config: DirectoryServiceConfig) {
    this.logger = config.logger;
    this.store = new DirectoryStore({
      namespaces: config.namespaces,
      source: config.source,
      logger: config.logger,
    });
    this.scheduler = new RefreshScheduler(this.store, {
      intervalMs: config.refreshIntervalMs,
      logger: config.logger,
    });
  }

  /**
   * Loads the directory once, then starts the refresh timer. A failed first
   * load is not fatal; the next scheduled refresh tries again.
   */
  async initialize(): Promise<void> {
    const result = await this.store.refresh();
    if (!result.ok) {
      this.logger.warn('Starting without a directory, lookups will miss until a refresh succeeds', {
        error: result.error.message,
      });
    }
    this.scheduler.start();
  }

  async shutdown(): Promise<void> {
    await this.scheduler.stop();
  }

  healthCheck(): HealthStatus {
    const snapshot = this.store.getSnapshot();
    if (!snapshot) {
      return { healthy: false, message: 'Directory not loaded' };
    }

    return {
      healthy: true,
      message: 'Directory loaded',
      details: {
        loaded_at: snapshot.loadedAt,
        scheduled: this.scheduler.isRunning(),
        counts: Object.fromEntries(
          snapshot.namespaces.map((name) => [name, snapshot.entries[name]?.length ?? 0])
        ),
      },
    };
  }
}
