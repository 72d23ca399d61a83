import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import {
  connect,
  createPostgresPool,
  isRetryableError,
  parseConnectionString,
  toPostgresPlaceholders,
  type DbConnection,
} from '../src/connect.js'

describe('parseConnectionString', () => {
  it('recognises sqlite URLs and bare database files', () => {
    expect(parseConnectionString('sqlite::memory:')).toEqual({ type: 'sqlite', config: ':memory:' })
    expect(parseConnectionString('sqlite:data/quotes.db')).toEqual({
      type: 'sqlite',
      config: 'data/quotes.db',
    })
    expect(parseConnectionString('quotes.sqlite')).toEqual({ type: 'sqlite', config: 'quotes.sqlite' })
  })

  it('recognises postgres URLs', () => {
    expect(parseConnectionString('postgres://reader@localhost/quotes').type).toBe('postgres')
    expect(parseConnectionString('postgresql://reader@localhost/quotes').type).toBe('postgres')
  })

  it('rejects anything else', () => {
    expect(() => parseConnectionString('mysql://localhost/quotes')).toThrow(
      /Unsupported database URL format/
    )
  })
})

describe('toPostgresPlaceholders', () => {
  it('numbers placeholders in order', () => {
    expect(toPostgresPlaceholders('SELECT * FROM t WHERE code = ? AND date BETWEEN ? AND ?')).toBe(
      'SELECT * FROM t WHERE code = $1 AND date BETWEEN $2 AND $3'
    )
  })

  it('leaves question marks inside string literals alone', () => {
    expect(toPostgresPlaceholders("SELECT '?' AS q WHERE code = ?")).toBe(
      "SELECT '?' AS q WHERE code = $1"
    )
  })
})

describe('isRetryableError', () => {
  it('retries connection refusals and busy databases', () => {
    expect(isRetryableError(Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }))).toBe(true)
    expect(isRetryableError(new Error('SQLITE_BUSY: database is locked'))).toBe(true)
  })

  it('does not retry SQL errors or non-errors', () => {
    expect(isRetryableError(new Error('no such table: krx_prices'))).toBe(false)
    expect(isRetryableError('ECONNREFUSED')).toBe(false)
  })
})

describe('SQLite connection', () => {
  let db: DbConnection

  beforeEach(async () => {
    db = await connect('sqlite::memory:')
    await db.execScript(`
      CREATE TABLE prices (code TEXT NOT NULL, date TEXT NOT NULL, close REAL);
      INSERT INTO prices VALUES ('AAA', '2023-01-02', 10.5);
      INSERT INTO prices VALUES ('AAA', '2023-01-03', 11);
    `)
  })

  afterEach(async () => {
    await db.close()
  })

  it('reports its type', () => {
    expect(db.dbType).toBe('sqlite')
  })

  it('queries rows with positional parameters', async () => {
    const rows = await db.query('SELECT date, close FROM prices WHERE code = ? ORDER BY date', ['AAA'])

    expect(rows).toEqual([
      { date: '2023-01-02', close: 10.5 },
      { date: '2023-01-03', close: 11 },
    ])
  })
})

describe('createPostgresPool', () => {
  it('logs idle client errors instead of leaving them unhandled', async () => {
    const logger = { info: vi.fn(), error: vi.fn() }
    // The pool connects lazily, so no server is needed here
    const pool = createPostgresPool(
      'postgresql://reader@127.0.0.1:5432/quotes',
      { connectTimeoutMs: 100, statementTimeoutMs: 100 },
      logger
    )

    expect(() => pool.emit('error', new Error('terminating connection due to administrator command'))).not.toThrow()
    expect(logger.error).toHaveBeenCalledWith('PostgreSQL idle client error', {
      error: 'Error: terminating connection due to administrator command',
    })

    await pool.end()
  })
})
