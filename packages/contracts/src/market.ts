/**
 * @fileoverview Domain records served by the query service.
 *
 * Pure data shapes with no I/O. Dates are ISO calendar dates
 * (`YYYY-MM-DD`), so string comparison is chronological comparison.
 *
 * @module @quotebook/contracts/market
 */

/**
 * ISO calendar date, e.g. `'2024-03-15'`.
 */
export type IsoDate = string;

/**
 * One row of a namespace's codes table.
 *
 * @invariant code is unique within its namespace
 */
export interface DirectoryEntry {
  code: string;
  name: string;
  market: string;
  sector: string;
}

/**
 * A partition of ticker codes by asset class and the tables that back it.
 *
 * Table names come from configuration only and never from a request.
 */
export interface NamespaceConfig {
  /** Namespace name, also the `market_type` / `type` request value (e.g. 'krx') */
  name: string;

  /** Market code handed to the calendar (e.g. 'KRX', 'US', 'COIN') */
  market: string;

  tables: NamespaceTables;
}

export interface NamespaceTables {
  codes: string;
  prices: string;
  signals: string;
  tradeHistory: string;
  profits: string;
  owned: string;
}

/**
 * A normalized store row. Always carries a code and a date; every other
 * column passes through as-is.
 *
 * @invariant unique per (code, date) within a price table
 */
export interface MarketRecord {
  code: string;
  date: IsoDate;
  [column: string]: unknown;
}

/**
 * A previously fetched contiguous date range held in the cache.
 *
 * @invariant data is sorted ascending by date with no duplicate dates
 * @invariant start_date / end_date equal the min / max date present in data
 */
export interface RangePayload<T extends MarketRecord = MarketRecord> {
  start_date: IsoDate;
  end_date: IsoDate;
  data: T[];
}

/**
 * Response body of `GET /prices`. The bounds echo what the caller asked for.
 */
export interface PriceRangeResponse {
  code: string;
  data: MarketRecord[];
  start_date: IsoDate | null;
  end_date: IsoDate | null;
}

/**
 * Response body of `GET /latest_signals`.
 */
export interface LatestSignalsResponse {
  today: IsoDate | null;
  next: IsoDate | null;
  buy: MarketRecord[];
  sell: MarketRecord[];
}
