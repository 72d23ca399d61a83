/**
 * @quotebook/db-simple
 *
 * Minimal read-side database connection for SQLite and PostgreSQL
 */

export {
  connect,
  createPostgresPool,
  isRetryableError,
  parseConnectionString,
  toPostgresPlaceholders,
  type DbConnection,
  type DbRow,
  type Logger,
  type ConnectOptions,
} from './connect.js'
