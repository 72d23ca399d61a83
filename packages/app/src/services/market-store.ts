/**
 * Every read the service makes against the relational store.
 *
 * Table names come from validated configuration; every value that originates
 * in a request is bound as a parameter.
 */

import {
  UpstreamUnavailableError,
  toIsoDate,
  type DirectoryEntry,
  type IsoDate,
  type MarketRecord,
  type NamespaceConfig,
} from '@quotebook/contracts';
import type { DbRow } from '@quotebook/db-simple';
import type { Logger } from '@quotebook/logger';
import { isMarketRecord, type RangeSource } from '@quotebook/range-cache';
import type { DirectorySource } from '@quotebook/symbol-directory';
import type { Queryable } from './database.service.js';

/**
 * A normalized row whose columns are not known in advance
 */
export type StoreRecord = Record<string, unknown>;

export interface LatestUpdate {
  table: string;
  latest_date: IsoDate | null;
}

/**
 * Convert driver values into JSON-safe ones: dates become `YYYY-MM-DD`,
 * bigints become numbers.
 */
export function normalizeRow(row: DbRow): StoreRecord {
  const normalized: StoreRecord = {};
  for (const [column, value] of Object.entries(row)) {
    if (value instanceof Date) {
      normalized[column] = toIsoDate(value);
    } else if (column === 'date' && typeof value === 'string') {
      // DATETIME columns come back as "YYYY-MM-DD HH:MM:SS"
      normalized[column] = toIsoDate(value) ?? value;
    } else if (typeof value === 'bigint') {
      normalized[column] = Number(value);
    } else {
      normalized[column] = value;
    }
  }
  return normalized;
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return '';
}

export class MarketStore implements DirectorySource {
  constructor(
    private db: Queryable,
    private logger: Logger
  ) {}

  async fetchEntries(namespace: NamespaceConfig): Promise<DirectoryEntry[]> {
    const rows = await this.run(
      'directory_entries',
      `SELECT code, name, market, sector FROM ${namespace.tables.codes}`
    );

    return rows
      .map((row) => ({
        code: asText(row['code']),
        name: asText(row['name']),
        market: asText(row['market']),
        sector: asText(row['sector']),
      }))
      .filter((entry) => entry.code.length > 0);
  }

  /**
   * Range source over one ticker's rows in the namespace's price table
   */
  priceRange(namespace: NamespaceConfig, code: string): RangeSource<MarketRecord> {
    const table = namespace.tables.prices;

    return {
      minDate: () =>
        this.dateAggregate('price_min_date', `SELECT MIN(date) AS value FROM ${table} WHERE code = ?`, [
          code,
        ]),
      maxDate: () =>
        this.dateAggregate('price_max_date', `SELECT MAX(date) AS value FROM ${table} WHERE code = ?`, [
          code,
        ]),
      fetchRange: async (from, to) =>
        this.toMarketRecords(
          await this.run(
            'price_range',
            `SELECT * FROM ${table} WHERE code = ? AND date BETWEEN ? AND ? ORDER BY date ASC`,
            [code, from, to]
          )
        ),
    };
  }

  async latestPrice(namespace: NamespaceConfig, code: string): Promise<MarketRecord | null> {
    const rows = await this.run(
      'latest_price',
      `SELECT * FROM ${namespace.tables.prices} WHERE code = ? ORDER BY date DESC LIMIT 1`,
      [code]
    );
    return this.toMarketRecords(rows)[0] ?? null;
  }

  async pricesOn(namespace: NamespaceConfig, date: IsoDate): Promise<MarketRecord[]> {
    const rows = await this.run(
      'prices_on_date',
      `SELECT * FROM ${namespace.tables.prices} WHERE date = ? ORDER BY code ASC`,
      [date]
    );
    return this.toMarketRecords(rows);
  }

  async signalsFor(namespace: NamespaceConfig, code: string): Promise<MarketRecord[]> {
    const rows = await this.run(
      'signals_for_code',
      `SELECT * FROM ${namespace.tables.signals} WHERE code = ? ORDER BY date ASC`,
      [code]
    );
    return this.toMarketRecords(rows);
  }

  latestSignalDate(namespace: NamespaceConfig, signalType: string): Promise<IsoDate | null> {
    return this.dateAggregate(
      'latest_signal_date',
      `SELECT MAX(date) AS value FROM ${namespace.tables.signals} WHERE signal_type = ?`,
      [signalType]
    );
  }

  async signalsOn(
    namespace: NamespaceConfig,
    signalType: string,
    date: IsoDate
  ): Promise<MarketRecord[]> {
    const rows = await this.run(
      'signals_on_date',
      `SELECT * FROM ${namespace.tables.signals} WHERE signal_type = ? AND date = ? ORDER BY code ASC`,
      [signalType, date]
    );
    return this.toMarketRecords(rows);
  }

  async tradeHistory(
    namespace: NamespaceConfig,
    signalType: string,
    start: IsoDate,
    end: IsoDate
  ): Promise<StoreRecord[]> {
    const rows = await this.run(
      'trade_history',
      `SELECT * FROM ${namespace.tables.tradeHistory} WHERE signal_type = ? AND date BETWEEN ? AND ? ORDER BY date ASC`,
      [signalType, start, end]
    );
    return rows.map(normalizeRow);
  }

  async profits(
    namespace: NamespaceConfig,
    signalType: string,
    uid: string,
    start: IsoDate
  ): Promise<StoreRecord[]> {
    const rows = await this.run(
      'profits',
      `SELECT * FROM ${namespace.tables.profits} WHERE signal_type = ? AND uid = ? AND date >= ? ORDER BY date ASC`,
      [signalType, uid, start]
    );
    return rows.map(normalizeRow);
  }

  async owned(namespace: NamespaceConfig, signalType: string): Promise<StoreRecord[]> {
    const rows = await this.run(
      'owned',
      `SELECT * FROM ${namespace.tables.owned} WHERE signal_type = ? ORDER BY code ASC`,
      [signalType]
    );
    return rows.map(normalizeRow);
  }

  /**
   * Latest date present in the namespace's price and signal tables
   */
  async latestUpdateDates(namespace: NamespaceConfig): Promise<LatestUpdate[]> {
    const tables = [namespace.tables.prices, namespace.tables.signals];

    return Promise.all(
      tables.map(async (table) => ({
        table,
        latest_date: await this.dateAggregate(
          'latest_update_date',
          `SELECT MAX(date) AS value FROM ${table}`
        ),
      }))
    );
  }

  private async dateAggregate(
    operation: string,
    sql: string,
    params: unknown[] = []
  ): Promise<IsoDate | null> {
    const rows = await this.run(operation, sql, params);
    return toIsoDate(rows[0]?.['value']);
  }

  private async run(operation: string, sql: string, params: unknown[] = []): Promise<DbRow[]> {
    try {
      return await this.db.query(sql, params);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Store query failed', { operation, error: message });
      throw new UpstreamUnavailableError(
        'Data store unavailable',
        { upstream: 'store', operation },
        error
      );
    }
  }

  /**
   * Normalized rows that carry a code and an ISO date; the rest are logged and dropped.
   */
  private toMarketRecords(rows: DbRow[]): MarketRecord[] {
    const records = rows.map(normalizeRow).filter(isMarketRecord);
    if (records.length < rows.length) {
      this.logger.warn('Dropped rows without a code and ISO date', {
        dropped: rows.length - records.length,
        total: rows.length,
      });
    }
    return records;
  }
}
