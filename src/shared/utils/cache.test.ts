import { describe, it, expect, vi, afterEach } from 'vitest';
import { TtlCache } from './cache.js';

describe('TtlCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should expire entries after the ttl', () => {
    vi.useFakeTimers();
    const cache = new TtlCache<string>({ ttlSeconds: 60 });
    cache.set('uid-1', 'Robin');

    vi.advanceTimersByTime(59_000);
    expect(cache.get('uid-1')).toBe('Robin');

    vi.advanceTimersByTime(2_000);
    expect(cache.get('uid-1')).toBeUndefined();
  });

  it('should evict the oldest entry when full', () => {
    const cache = new TtlCache<number>({ ttlSeconds: 60, maxEntries: 2 });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);

    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('c')).toBe(3);
    expect(cache.size).toBe(2);
  });

  it('should load once and reuse the value', async () => {
    const cache = new TtlCache<string>({ ttlSeconds: 60 });
    const load = vi.fn(async () => 'Robin');

    await cache.getOrLoad('uid-1', load);
    const value = await cache.getOrLoad('uid-1', load);

    expect(value).toBe('Robin');
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('should not cache a missing value', async () => {
    const cache = new TtlCache<string>({ ttlSeconds: 60 });
    const load = vi.fn(async (): Promise<string | undefined> => undefined);

    await cache.getOrLoad('uid-1', load);
    await cache.getOrLoad('uid-1', load);

    expect(load).toHaveBeenCalledTimes(2);
  });
});
