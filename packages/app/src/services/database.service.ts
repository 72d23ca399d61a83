/**
 * Relational store connection as a container service
 */

import { connect, type DbConnection, type DbRow } from '@quotebook/db-simple';
import { maskUrlCredentials, type Logger } from '@quotebook/logger';
import type { HealthStatus, Service } from '../container/types.js';

export interface DatabaseServiceConfig {
  logger: Logger;
  url: string;
  connectTimeoutMs?: number;
  statementTimeoutMs?: number;
}

/**
 * Anything that can run a parameterized read
 */
export interface Queryable {
  query(sql: string, params?: unknown[]): Promise<DbRow[]>;
}

export class DatabaseService implements Service, Queryable {
  readonly name = 'database';
  readonly dependencies: string[] = [];

  private logger: Logger;
  private db: DbConnection | null = null;

  constructor(private config: DatabaseServiceConfig) {
    this.logger = config.logger;
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    this.db = await connect(this.config.url, {
      logger: this.logger,
      connectTimeoutMs: this.config.connectTimeoutMs,
      statementTimeoutMs: this.config.statementTimeoutMs,
    });
    this.logger.info('Database connected', {
      url: maskUrlCredentials(this.config.url),
      db_type: this.db.dbType,
    });
  }

  async shutdown(): Promise<void> {
    if (!this.db) return;
    await this.db.close();
    this.db = null;
    this.logger.info('Database connection closed');
  }

  /**
   * The open connection. Throws before `initialize()`.
   */
  get connection(): DbConnection {
    if (!this.db) {
      throw new Error('Database service not initialized');
    }
    return this.db;
  }

  query(sql: string, params: unknown[] = []): Promise<DbRow[]> {
    return this.connection.query(sql, params);
  }

  async healthCheck(): Promise<HealthStatus> {
    if (!this.db) {
      return { healthy: false, message: 'Not connected' };
    }
    try {
      await this.db.query('SELECT 1');
      return { healthy: true, message: 'Connected', details: { type: this.db.dbType } };
    } catch (error) {
      return {
        healthy: false,
        message: error instanceof Error ? error.message : String(error),
        details: { type: this.db.dbType },
      };
    }
  }
}
