/**
 * Library cache tests
 */

import { describe, it, expect, vi } from 'vitest';
import { createLibraryCache } from '../cache.js';
import { createClock, makeItem } from '../../test/fakes.js';

describe('createLibraryCache', () => {
  it('returns a stored listing until the TTL passes', () => {
    const clock = createClock();
    const cache = createLibraryCache({ ttlMs: 1000, now: clock.now });
    const items = [makeItem()];

    cache.setLibrary('user-1', items);
    clock.advance(999);
    expect(cache.getLibrary('user-1')).toBe(items);

    clock.advance(1);
    expect(cache.getLibrary('user-1')).toBeNull();
  });

  it('shares one load between concurrent callers', async () => {
    const cache = createLibraryCache({ ttlMs: 1000 });
    const items = [makeItem()];
    const load = vi.fn(async () => items);

    const [first, second] = await Promise.all([cache.getOrLoad('user-1', load), cache.getOrLoad('user-1', load)]);

    expect(first).toBe(items);
    expect(second).toBe(items);
    expect(load).toHaveBeenCalledTimes(1);

    await cache.getOrLoad('user-1', load);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('keeps users apart', async () => {
    const cache = createLibraryCache({ ttlMs: 1000 });
    const load = vi.fn(async () => [makeItem()]);

    await cache.getOrLoad('user-1', load);
    await cache.getOrLoad('user-2', load);

    expect(load).toHaveBeenCalledTimes(2);
  });

  it('does not cache a failed load', async () => {
    const cache = createLibraryCache({ ttlMs: 1000 });
    const items = [makeItem()];
    const load = vi.fn<() => Promise<ReturnType<typeof makeItem>[]>>();
    load.mockRejectedValueOnce(new Error('upstream down')).mockResolvedValueOnce(items);

    await expect(cache.getOrLoad('user-1', load)).rejects.toThrow('upstream down');
    expect(await cache.getOrLoad('user-1', load)).toBe(items);
  });

  it('reloads after invalidate and clear', async () => {
    const cache = createLibraryCache({ ttlMs: 1000 });
    const load = vi.fn(async () => [makeItem()]);

    await cache.getOrLoad('user-1', load);
    cache.invalidate('user-1');
    await cache.getOrLoad('user-1', load);
    cache.clear();
    await cache.getOrLoad('user-1', load);

    expect(load).toHaveBeenCalledTimes(3);
  });

  it('caches nothing with a zero TTL', async () => {
    const cache = createLibraryCache({ ttlMs: 0 });
    const load = vi.fn(async () => [makeItem()]);

    await cache.getOrLoad('user-1', load);
    await cache.getOrLoad('user-1', load);

    expect(load).toHaveBeenCalledTimes(2);
  });
});
