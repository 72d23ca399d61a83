import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { UpstreamUnavailableError, type NamespaceConfig } from '@quotebook/contracts';
import { MarketStore, normalizeRow } from '../src/services/market-store.js';
import type { DatabaseService } from '../src/services/database.service.js';
import { createSeededDatabase, createSilentLogger, testConfig } from './helpers.js';

const logger = createSilentLogger();

function namespaceNamed(name: string): NamespaceConfig {
  const namespace = testConfig().directory.namespaces.find((candidate) => candidate.name === name);
  if (!namespace) throw new Error(`test namespace missing: ${name}`);
  return namespace;
}

describe('MarketStore', () => {
  const krx = namespaceNamed('krx');
  const usx = namespaceNamed('usx');
  let database: DatabaseService;
  let store: MarketStore;

  beforeAll(async () => {
    database = await createSeededDatabase(logger);
    store = new MarketStore(database, logger);
  });

  afterAll(async () => {
    await database.shutdown();
  });

  describe('fetchEntries', () => {
    it('returns every row of the codes table, duplicates included', async () => {
      const entries = await store.fetchEntries(krx);

      expect(entries.map((entry) => entry.code)).toEqual(['005930', '000660', 'DUAL', '005930']);
    });

    it('maps a NULL sector to an empty string', async () => {
      const entries = await store.fetchEntries(usx);

      expect(entries.find((entry) => entry.code === 'NODATA')).toEqual({
        code: 'NODATA',
        name: 'Listed Without Prices',
        market: 'NYSE',
        sector: '',
      });
    });
  });

  describe('priceRange', () => {
    it('reports the stored bounds for a ticker', async () => {
      const range = store.priceRange(usx, 'AAPL');

      expect(await range.minDate()).toBe('2024-03-11');
      expect(await range.maxDate()).toBe('2024-03-15');
    });

    it('returns null bounds for a ticker without rows', async () => {
      const range = store.priceRange(usx, 'NODATA');

      expect(await range.minDate()).toBeNull();
      expect(await range.maxDate()).toBeNull();
    });

    it('fetches an inclusive range in date order', async () => {
      const rows = await store.priceRange(krx, '005930').fetchRange('2024-03-12', '2024-03-14');

      expect(rows.map((row) => [row.date, row['close']])).toEqual([
        ['2024-03-12', 72500],
        ['2024-03-13', 73000],
        ['2024-03-14', 73500],
      ]);
    });
  });

  it('finds the most recent price row', async () => {
    const row = await store.latestPrice(usx, 'AAPL');

    expect(row?.date).toBe('2024-03-15');
    expect(row?.['close']).toBe(172.62);
  });

  it('returns null when a ticker has no price rows', async () => {
    expect(await store.latestPrice(usx, 'NODATA')).toBeNull();
  });

  it('lists prices on a date ordered by code', async () => {
    const rows = await store.pricesOn(usx, '2024-03-15');

    expect(rows.map((row) => row.code)).toEqual(['AAPL', 'DUAL', 'MSFT']);
  });

  it('lists signals for a ticker in date order', async () => {
    const rows = await store.signalsFor(krx, '000660');

    expect(rows.map((row) => [row.date, row['signal_type']])).toEqual([
      ['2024-03-13', 'reversal'],
      ['2024-03-15', 'momentum'],
    ]);
  });

  it('finds the latest date for a signal type', async () => {
    expect(await store.latestSignalDate(krx, 'momentum')).toBe('2024-03-15');
    expect(await store.latestSignalDate(krx, 'breakout')).toBeNull();
  });

  it('lists signals of one type on one date', async () => {
    const rows = await store.signalsOn(krx, 'momentum', '2024-03-15');

    expect(rows.map((row) => [row.code, row['action']])).toEqual([
      ['000660', 'buy'],
      ['005930', 'sell'],
    ]);
  });

  describe('tradeHistory', () => {
    it('filters by signal type and inclusive date bounds', async () => {
      const rows = await store.tradeHistory(krx, 'momentum', '2024-03-11', '2024-03-14');

      expect(rows.map((row) => [row['code'], row['date'], row['action']])).toEqual([
        ['005930', '2024-03-11', 'buy'],
        ['005930', '2024-03-14', 'sell'],
      ]);
    });

    it('binds request values as parameters', async () => {
      const rows = await store.tradeHistory(
        krx,
        "momentum' OR '1'='1",
        '2024-01-01',
        '2024-12-31'
      );

      expect(rows).toEqual([]);
    });
  });

  it('filters profits by user and start date', async () => {
    const rows = await store.profits(krx, 'momentum', 'user-1', '2024-03-10');

    expect(rows.map((row) => [row['date'], row['profit']])).toEqual([
      ['2024-03-14', 15000],
      ['2024-03-15', -2000],
    ]);
  });

  it('lists owned positions for a signal type', async () => {
    const rows = await store.owned(krx, 'reversal');

    expect(rows).toEqual([{ code: '005930', signal_type: 'reversal', quantity: 5, avg_price: 71000 }]);
  });

  it('reports the latest date of the price and signal tables', async () => {
    expect(await store.latestUpdateDates(usx)).toEqual([
      { table: 'usx_prices', latest_date: '2024-03-15' },
      { table: 'usx_signals', latest_date: '2024-03-12' },
    ]);
  });

  it('wraps driver failures as upstream errors', async () => {
    const broken = new MarketStore(
      { query: () => Promise.reject(new Error('connection reset')) },
      logger
    );

    const failure = broken.latestPrice(krx, '005930');

    await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(failure).rejects.toMatchObject({
      message: 'Data store unavailable',
      data: { upstream: 'store', operation: 'latest_price' },
    });
  });
});

describe('normalizeRow', () => {
  it('turns dates into ISO days and bigints into numbers', () => {
    expect(
      normalizeRow({ date: new Date(2024, 2, 15), volume: 42n, close: 1.5, note: null })
    ).toEqual({ date: '2024-03-15', volume: 42, close: 1.5, note: null });
  });

  it('trims a time of day off the date column', () => {
    expect(normalizeRow({ code: 'AAA', date: '2024-03-15 00:00:00', memo: '2024-03-15 09:30:00' })).toEqual({
      code: 'AAA',
      date: '2024-03-15',
      memo: '2024-03-15 09:30:00',
    });
  });
});

describe('MarketStore row normalization', () => {
  it('drops rows without an ISO date and logs how many', async () => {
    const warnLogger = createSilentLogger();
    const warn = vi.spyOn(warnLogger, 'warn');
    const store = new MarketStore(
      {
        query: async () => [
          { code: 'AAA', date: '2024-03-15 00:00:00', close: 10 },
          { code: 'AAA', date: 'yesterday', close: 9 },
        ],
      },
      warnLogger
    );

    const records = await store.pricesOn(namespaceNamed('usx'), '2024-03-15');

    expect(records).toEqual([{ code: 'AAA', date: '2024-03-15', close: 10 }]);
    expect(warn).toHaveBeenCalledWith('Dropped rows without a code and ISO date', {
      dropped: 1,
      total: 2,
    });
  });
});
