import { describe, it, expect, vi } from 'vitest';
import type { DirectoryEntry, NamespaceConfig } from '@quotebook/contracts';
import { DirectoryStore, buildDirectoryState } from '../src/directory-store.js';
import type { DirectorySource } from '../src/types.js';

function namespace(name: string, market: string): NamespaceConfig {
  return {
    name,
    market,
    tables: {
      codes: `${name}_codes`,
      prices: `${name}_prices`,
      signals: `${name}_signals`,
      tradeHistory: `${name}_trade_history`,
      profits: `${name}_profits`,
      owned: `${name}_owned`,
    },
  };
}

function entry(code: string, market = 'TEST'): DirectoryEntry {
  return { code, name: `${code} Corp`, market, sector: 'Testing' };
}

const NAMESPACES = [namespace('krx', 'KRX'), namespace('usx', 'US'), namespace('coin', 'COIN')];

/**
 * In-memory source whose contents and failure mode tests can change between refreshes.
 */
class FakeSource implements DirectorySource {
  calls = 0;
  failWith: Error | null = null;

  constructor(public data: Record<string, DirectoryEntry[]>) {}

  async fetchEntries(ns: NamespaceConfig): Promise<DirectoryEntry[]> {
    this.calls += 1;
    if (this.failWith) throw this.failWith;
    return this.data[ns.name] ?? [];
  }
}

describe('DirectoryStore', () => {
  it('is empty until the first refresh', () => {
    const store = new DirectoryStore({ namespaces: NAMESPACES, source: new FakeSource({}) });

    expect(store.isLoaded()).toBe(false);
    expect(store.getSnapshot()).toBeNull();
    expect(store.findNamespace('AAA')).toBeNull();
  });

  it('finds the namespace listing a ticker and reports unknown tickers as null', async () => {
    const source = new FakeSource({
      krx: [entry('005930')],
      usx: [entry('AAPL'), entry('MSFT')],
      coin: [entry('BTC')],
    });
    const store = new DirectoryStore({ namespaces: NAMESPACES, source });

    const result = await store.refresh();

    expect(result.ok).toBe(true);
    expect(store.findNamespace('005930')).toBe('krx');
    expect(store.findNamespace('MSFT')).toBe('usx');
    expect(store.findNamespace('BTC')).toBe('coin');
    expect(store.findNamespace('ZZZ')).toBeNull();
  });

  it('resolves a code listed in several namespaces to the first configured one', async () => {
    const source = new FakeSource({ usx: [entry('DUP')], coin: [entry('DUP')] });
    const store = new DirectoryStore({ namespaces: NAMESPACES, source });
    await store.refresh();

    expect(store.findNamespace('DUP')).toBe('usx');

    const reversed = new DirectoryStore({ namespaces: [...NAMESPACES].reverse(), source });
    await reversed.refresh();

    expect(reversed.findNamespace('DUP')).toBe('coin');
  });

  it('keeps the first row when a namespace repeats a code', async () => {
    const source = new FakeSource({
      krx: [{ ...entry('AAA'), name: 'First' }, { ...entry('AAA'), name: 'Second' }],
    });
    const store = new DirectoryStore({ namespaces: NAMESPACES, source });
    await store.refresh();

    expect(store.getSnapshot()?.entries['krx']).toEqual([{ ...entry('AAA'), name: 'First' }]);
  });

  it('keeps the previous snapshot intact when a refresh fails', async () => {
    const source = new FakeSource({ krx: [entry('AAA')], usx: [entry('BBB')] });
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const store = new DirectoryStore({ namespaces: NAMESPACES, source, logger });
    await store.refresh();
    const before = store.getSnapshot();

    source.data = { krx: [entry('CCC')] };
    source.failWith = new Error('connect ECONNREFUSED');
    const result = await store.refresh();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('connect ECONNREFUSED');
    }
    expect(store.getSnapshot()).toBe(before);
    expect(store.findNamespace('AAA')).toBe('krx');
    expect(store.findNamespace('BBB')).toBe('usx');
    expect(store.findNamespace('CCC')).toBeNull();
    expect(logger.error).toHaveBeenCalledWith(
      'Directory refresh failed, keeping previous snapshot',
      expect.objectContaining({ error: 'connect ECONNREFUSED' })
    );
  });

  it('applies nothing when only one namespace fails', async () => {
    const source: DirectorySource = {
      async fetchEntries(ns) {
        if (ns.name === 'coin') throw new Error('timeout');
        return [entry(`${ns.name.toUpperCase()}1`)];
      },
    };
    const store = new DirectoryStore({ namespaces: NAMESPACES, source });

    const result = await store.refresh();

    expect(result.ok).toBe(false);
    expect(store.isLoaded()).toBe(false);
    expect(store.findNamespace('KRX1')).toBeNull();
  });

  it('replaces the snapshot wholesale on success', async () => {
    const source = new FakeSource({ krx: [entry('OLD')] });
    const store = new DirectoryStore({ namespaces: NAMESPACES, source });
    await store.refresh();
    const first = store.getSnapshot();

    source.data = { krx: [entry('NEW')] };
    await store.refresh();

    expect(store.getSnapshot()).not.toBe(first);
    expect(first?.entries['krx']).toEqual([entry('OLD')]);
    expect(store.findNamespace('OLD')).toBeNull();
    expect(store.findNamespace('NEW')).toBe('krx');
  });

  it('shares one in-flight refresh between concurrent callers', async () => {
    const source = new FakeSource({ krx: [entry('AAA')] });
    const store = new DirectoryStore({ namespaces: NAMESPACES, source });

    const [a, b] = await Promise.all([store.refresh(), store.refresh()]);

    expect(a).toBe(b);
    expect(source.calls).toBe(NAMESPACES.length);

    await store.refresh();
    expect(source.calls).toBe(NAMESPACES.length * 2);
  });
});

describe('buildDirectoryState', () => {
  it('freezes the snapshot and lists namespaces in configured order', () => {
    const state = buildDirectoryState(
      NAMESPACES,
      new Map([['usx', [entry('AAPL')]]]),
      new Date('2024-03-15T09:00:00.000Z')
    );

    expect(state.snapshot.loadedAt).toBe('2024-03-15T09:00:00.000Z');
    expect(state.snapshot.namespaces).toEqual(['krx', 'usx', 'coin']);
    expect(state.snapshot.entries).toEqual({ krx: [], usx: [entry('AAPL')], coin: [] });
    expect(Object.isFrozen(state.snapshot)).toBe(true);
    expect(Object.isFrozen(state.snapshot.entries)).toBe(true);
    expect(Object.isFrozen(state.snapshot.entries['usx'])).toBe(true);
  });
});
