import { describe, it, expect, vi, afterEach } from 'vitest';
import type { NamespaceConfig } from '@quotebook/contracts';
import { DirectoryStore } from '../src/directory-store.js';
import { RefreshScheduler } from '../src/scheduler.js';

const KRX: NamespaceConfig = {
  name: 'krx',
  market: 'KRX',
  tables: {
    codes: 'krx_codes',
    prices: 'krx_prices',
    signals: 'krx_signals',
    tradeHistory: 'krx_trade_history',
    profits: 'krx_profits',
    owned: 'krx_owned',
  },
};

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('RefreshScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('refreshes on every interval', async () => {
    vi.useFakeTimers();
    const fetchEntries = vi.fn(async () => [{ code: 'AAA', name: 'A', market: 'KRX', sector: 'x' }]);
    const store = new DirectoryStore({ namespaces: [KRX], source: { fetchEntries } });
    const scheduler = new RefreshScheduler(store, { intervalMs: 1000 });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(3000);
    await scheduler.stop();

    expect(fetchEntries).toHaveBeenCalledTimes(3);
    expect(store.findNamespace('AAA')).toBe('krx');
  });

  it('keeps ticking after a failed refresh', async () => {
    vi.useFakeTimers();
    const fetchEntries = vi
      .fn()
      .mockRejectedValueOnce(new Error('store unreachable'))
      .mockResolvedValue([{ code: 'BBB', name: 'B', market: 'KRX', sector: 'x' }]);
    const logger = createLogger();
    const store = new DirectoryStore({ namespaces: [KRX], source: { fetchEntries } });
    const scheduler = new RefreshScheduler(store, { intervalMs: 1000, logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(1000);

    await vi.waitFor(() =>
      expect(logger.warn).toHaveBeenCalledWith(
        'Scheduled directory refresh failed, retrying next interval',
        { error: 'store unreachable' }
      )
    );
    expect(store.isLoaded()).toBe(false);

    await vi.advanceTimersByTimeAsync(1000);
    await scheduler.stop();

    expect(store.findNamespace('BBB')).toBe('krx');
  });

  it('stops scheduling once stopped', async () => {
    vi.useFakeTimers();
    const fetchEntries = vi.fn(async () => []);
    const store = new DirectoryStore({ namespaces: [KRX], source: { fetchEntries } });
    const scheduler = new RefreshScheduler(store, { intervalMs: 1000 });

    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);
    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(5000);

    expect(scheduler.isRunning()).toBe(false);
    expect(fetchEntries).not.toHaveBeenCalled();
  });

  it('rejects a non-positive interval', () => {
    const store = new DirectoryStore({ namespaces: [KRX], source: { fetchEntries: async () => [] } });

    expect(() => new RefreshScheduler(store, { intervalMs: 0 })).toThrow(/positive/);
  });
});
