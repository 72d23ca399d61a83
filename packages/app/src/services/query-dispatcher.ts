/**
 * Request pipeline behind every endpoint.
 *
 * route → cache check → hit: respond | miss: fetch → merge → cache write →
 * respond. Cache trouble never fails a request; store trouble surfaces as
 * UpstreamUnavailableError and is not retried.
 */

import {
  NotFoundError,
  QuotebookError,
  type DirectoryEntry,
  type IsoDate,
  type LatestSignalsResponse,
  type MarketRecord,
  type NamespaceConfig,
  type PriceRangeResponse,
} from '@quotebook/contracts';
import { startTimer, type Logger } from '@quotebook/logger';
import { getDefaultCalendar, type MarketCalendar } from '@quotebook/market-calendar';
import {
  SingleFlight,
  buildCacheKey,
  isMarketRecord,
  isMarketRecordArray,
  isRangePayload,
  mergeRange,
  priceRequestKey,
  pricesKey,
  type CacheGateway,
} from '@quotebook/range-cache';
import type { DirectoryStore } from '@quotebook/symbol-directory';
import type { LatestUpdate, MarketStore, StoreRecord } from './market-store.js';

export interface QueryDispatcherConfig {
  logger: Logger;
  namespaces: readonly NamespaceConfig[];
  directory: DirectoryStore;
  store: MarketStore;
  cache: CacheGateway;
  calendar?: MarketCalendar;
  /** Coalesce concurrent identical price requests */
  singleFlight?: boolean;
}

export interface PriceQuery {
  ticker: string;
  start?: IsoDate;
  end?: IsoDate;
}

export interface TickerRecordResponse<T> {
  code: string;
  data: T;
}

export interface TablesResponse {
  loaded_at: string;
  tables: Record<string, readonly DirectoryEntry[]>;
}

export interface RefreshResponse {
  message: string;
}

export class QueryDispatcher {
  private logger: Logger;
  private namespaces: Map<string, NamespaceConfig>;
  private directory: DirectoryStore;
  private store: MarketStore;
  private cache: CacheGateway;
  private calendar: MarketCalendar;
  private priceFlights: SingleFlight<PriceRangeResponse>;

  constructor(config: QueryDispatcherConfig) {
    this.logger = config.logger;
    this.namespaces = new Map(config.namespaces.map((namespace) => [namespace.name, namespace]));
    this.directory = config.directory;
    this.store = config.store;
    this.cache = config.cache;
    this.calendar = config.calendar ?? getDefaultCalendar();
    this.priceFlights = new SingleFlight<PriceRangeResponse>(config.singleFlight ?? true);
  }

  /**
   * Price range for a ticker. The ticker's cached range is widened with only
   * the days it lacks; the response echoes the bounds the caller asked for.
   */
  async getPrices(query: PriceQuery): Promise<PriceRangeResponse> {
    const namespace = this.route(query.ticker);
    return this.priceFlights.run(priceRequestKey(query.ticker, query.start, query.end), () =>
      this.loadPrices(namespace, query)
    );
  }

  private async loadPrices(
    namespace: NamespaceConfig,
    { ticker, start, end }: PriceQuery
  ): Promise<PriceRangeResponse> {
    const timer = startTimer();
    const key = pricesKey(ticker);

    const cached = await this.cache.get(key, isRangePayload);
    const source = this.store.priceRange(namespace, ticker);
    const result = await mergeRange({ start, end }, cached, source);

    if (result.payload && result.fetchedRange) {
      await this.cache.set(key, result.payload);
    }

    this.logger.debug('Price range served', {
      ticker,
      namespace: namespace.name,
      cache: cached ? 'hit' : 'miss',
      fetched_range: result.fetchedRange,
      fetched: result.fetched,
      count: result.records.length,
      duration_ms: timer.stop(),
    });

    // A cold read of an empty window says nothing about the ticker's history
    if (!result.payload && (await source.minDate()) === null) {
      throw new NotFoundError(`No price data for ${ticker}`, { ticker });
    }

    return {
      code: ticker,
      data: result.records,
      start_date: start ?? null,
      end_date: end ?? null,
    };
  }

  async getLatestPriceForTicker(ticker: string): Promise<TickerRecordResponse<MarketRecord>> {
    const namespace = this.route(ticker);

    const data = await this.cached(buildCacheKey('latest', ticker), isMarketRecord, () =>
      this.store.latestPrice(namespace, ticker)
    );
    if (!data) {
      throw new NotFoundError(`No price data for ${ticker}`, { ticker });
    }

    return { code: ticker, data };
  }

  async getLatestPrices(marketType: string, date: IsoDate): Promise<MarketRecord[]> {
    const namespace = this.namespace(marketType);

    const records = await this.cached(
      buildCacheKey('latest', marketType, date),
      isMarketRecordArray,
      async () => nonEmpty(await this.store.pricesOn(namespace, date))
    );
    if (!records) {
      throw new NotFoundError(`No prices for ${marketType} on ${date}`, {
        market_type: marketType,
        date,
      });
    }

    return records;
  }

  /**
   * Signals of the most recent signal day, split by action, with the next
   * trading day after it.
   */
  async getLatestSignals(type: string, signalType: string): Promise<LatestSignalsResponse> {
    const namespace = this.namespace(type);

    const today = await this.store.latestSignalDate(namespace, signalType);
    if (!today) {
      return { today: null, next: null, buy: [], sell: [] };
    }

    const signals = await this.store.signalsOn(namespace, signalType, today);
    const action = (record: MarketRecord) => String(record['action'] ?? '').toLowerCase();

    return {
      today,
      next: this.nextTradingDate(namespace, today),
      buy: signals.filter((record) => action(record) === 'buy'),
      sell: signals.filter((record) => action(record) === 'sell'),
    };
  }

  async getSignals(ticker: string): Promise<TickerRecordResponse<MarketRecord[]>> {
    const namespace = this.route(ticker);

    const data = await this.cached(buildCacheKey('signals', ticker), isMarketRecordArray, async () =>
      nonEmpty(await this.store.signalsFor(namespace, ticker))
    );
    if (!data) {
      throw new NotFoundError(`No signals for ${ticker}`, { ticker });
    }

    return { code: ticker, data };
  }

  async getTradeHistory(
    type: string,
    signalType: string,
    start: IsoDate,
    end: IsoDate
  ): Promise<StoreRecord[]> {
    const rows = await this.store.tradeHistory(this.namespace(type), signalType, start, end);
    if (rows.length === 0) {
      throw new NotFoundError('No trade history found', { type, signal_type: signalType });
    }
    return rows;
  }

  async getProfits(
    type: string,
    signalType: string,
    start: IsoDate,
    uid: string
  ): Promise<StoreRecord[]> {
    const rows = await this.store.profits(this.namespace(type), signalType, uid, start);
    if (rows.length === 0) {
      throw new NotFoundError('No profit records found', { type, signal_type: signalType });
    }
    return rows;
  }

  async getOwned(type: string, signalType: string): Promise<StoreRecord[]> {
    const rows = await this.store.owned(this.namespace(type), signalType);
    if (rows.length === 0) {
      throw new NotFoundError('No owned positions found', { type, signal_type: signalType });
    }
    return rows;
  }

  async getLatestUpdateDate(marketType: string): Promise<LatestUpdate[]> {
    const updates = await this.store.latestUpdateDates(this.namespace(marketType));
    if (updates.every((update) => update.latest_date === null)) {
      throw new NotFoundError(`No data for ${marketType}`, { market_type: marketType });
    }
    return updates;
  }

  /**
   * Reload the directory now. The previous directory stays in place on failure.
   */
  async refreshTables(): Promise<RefreshResponse> {
    const result = await this.directory.refresh();
    if (!result.ok) {
      throw new QuotebookError('INTERNAL_ERROR', 'Failed to update table data', 500, {
        reason: result.error.message,
      });
    }
    return { message: 'Table data successfully updated' };
  }

  getTables(): TablesResponse {
    const snapshot = this.directory.getSnapshot();
    if (!snapshot) {
      throw new QuotebookError('INTERNAL_ERROR', 'Table data not loaded', 500);
    }

    const tables: Record<string, readonly DirectoryEntry[]> = {};
    for (const name of snapshot.namespaces) {
      const namespace = this.namespaces.get(name);
      if (namespace) {
        tables[namespace.tables.codes] = snapshot.entries[name] ?? [];
      }
    }

    return { loaded_at: snapshot.loadedAt, tables };
  }

  /**
   * Namespace whose directory lists `ticker`
   */
  private route(ticker: string): NamespaceConfig {
    const name = this.directory.findNamespace(ticker);
    const namespace = name === null ? undefined : this.namespaces.get(name);
    if (!namespace) {
      throw new NotFoundError(`Ticker ${ticker} not found in any table`, { ticker });
    }
    return namespace;
  }

  private namespace(name: string): NamespaceConfig {
    const namespace = this.namespaces.get(name);
    if (!namespace) {
      throw new NotFoundError(`Unknown market type: ${name}`, {
        market_type: name,
        available: [...this.namespaces.keys()],
      });
    }
    return namespace;
  }

  /**
   * Cache-aside read. Null from `load` is a miss that is not cached.
   */
  private async cached<T>(
    key: string,
    validate: (value: unknown) => value is T,
    load: () => Promise<T | null>
  ): Promise<T | null> {
    const hit = await this.cache.get(key, validate);
    if (hit !== null) {
      return hit;
    }

    const value = await load();
    if (value !== null) {
      await this.cache.set(key, value);
    }
    return value;
  }

  private nextTradingDate(namespace: NamespaceConfig, date: IsoDate): IsoDate | null {
    if (!this.calendar.hasMarket(namespace.market)) {
      this.logger.warn('No calendar for market, next trading date unknown', {
        namespace: namespace.name,
        market: namespace.market,
      });
      return null;
    }
    return this.calendar.nextTradingDate(namespace.market, date);
  }
}

function nonEmpty<T>(items: T[]): T[] | null {
  return items.length > 0 ? items : null;
}
