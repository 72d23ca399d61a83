import { describe, it, expect } from 'vitest';
import { MemoryKeyValueStore } from '../src/kv-store.js';
import { SingleFlight } from '../src/single-flight.js';

describe('MemoryKeyValueStore', () => {
  it('expires values after their TTL', async () => {
    let now = 1_000_000;
    const store = new MemoryKeyValueStore(100, () => now);

    await store.setex('k', 300, 'v');
    now += 299_999;
    await expect(store.get('k')).resolves.toBe('v');

    now += 1;
    await expect(store.get('k')).resolves.toBeNull();
    expect(store.size()).toBe(0);
  });

  it('evicts the least recently used key when full', async () => {
    const store = new MemoryKeyValueStore(2);

    await store.setex('a', 300, '1');
    await store.setex('b', 300, '2');
    await store.get('a');
    await store.setex('c', 300, '3');

    await expect(store.get('a')).resolves.toBe('1');
    await expect(store.get('b')).resolves.toBeNull();
    await expect(store.get('c')).resolves.toBe('3');
  });

  it('drops everything on close', async () => {
    const store = new MemoryKeyValueStore();
    await store.setex('a', 300, '1');

    await store.close();

    expect(store.size()).toBe(0);
  });
});

describe('SingleFlight', () => {
  it('shares one call between concurrent callers of the same key', async () => {
    const flights = new SingleFlight<number>();
    let calls = 0;
    let release: (value: number) => void = () => {};
    const fn = () => {
      calls += 1;
      return new Promise<number>((resolve) => {
        release = resolve;
      });
    };

    const a = flights.run('k', fn);
    const b = flights.run('k', fn);
    expect(flights.size()).toBe(1);
    release(42);

    await expect(Promise.all([a, b])).resolves.toEqual([42, 42]);
    expect(calls).toBe(1);
    expect(flights.size()).toBe(0);
  });

  it('runs different keys independently', async () => {
    const flights = new SingleFlight<string>();

    const [a, b] = await Promise.all([
      flights.run('a', async () => 'A'),
      flights.run('b', async () => 'B'),
    ]);

    expect([a, b]).toEqual(['A', 'B']);
  });

  it('forgets a key once its call fails', async () => {
    const flights = new SingleFlight<string>();

    await expect(flights.run('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(flights.run('k', async () => 'ok')).resolves.toBe('ok');
  });

  it('runs every call when disabled', async () => {
    const flights = new SingleFlight<number>(false);
    let calls = 0;
    const fn = async () => ++calls;

    await Promise.all([flights.run('k', fn), flights.run('k', fn)]);

    expect(calls).toBe(2);
  });
});
