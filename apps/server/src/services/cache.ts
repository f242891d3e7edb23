/**
 * Library cache
 *
 * HereSphere asks for the index and the scan back to back, each needing the
 * full library. Listings are kept in memory per Jellyfin user for a short TTL
 * so one browse costs one enumeration. Nothing here is durable.
 */

import type { JellyfinItem } from './mediaServer/types.js';

export interface LibraryCacheService {
  getLibrary(userId: string): JellyfinItem[] | null;
  setLibrary(userId: string, items: JellyfinItem[]): void;
  /**
   * Return the cached listing or load it. Concurrent callers for one user
   * share a single in-flight load.
   */
  getOrLoad(userId: string, load: () => Promise<JellyfinItem[]>): Promise<JellyfinItem[]>;
  invalidate(userId: string): void;
  clear(): void;
}

interface CacheEntry {
  items: JellyfinItem[];
  expiresAt: number;
}

export interface LibraryCacheOptions {
  ttlMs: number;
  now?: () => number;
}

export function createLibraryCache(options: LibraryCacheOptions): LibraryCacheService {
  const now = options.now ?? Date.now;
  const entries = new Map<string, CacheEntry>();
  const inflight = new Map<string, Promise<JellyfinItem[]>>();

  const cache: LibraryCacheService = {
    getLibrary(userId: string): JellyfinItem[] | null {
      const entry = entries.get(userId);
      if (!entry) return null;
      if (entry.expiresAt <= now()) {
        entries.delete(userId);
        return null;
      }
      return entry.items;
    },

    setLibrary(userId: string, items: JellyfinItem[]): void {
      if (options.ttlMs <= 0) return;
      entries.set(userId, { items, expiresAt: now() + options.ttlMs });
    },

    async getOrLoad(userId: string, load: () => Promise<JellyfinItem[]>): Promise<JellyfinItem[]> {
      const cached = cache.getLibrary(userId);
      if (cached) return cached;

      const pending = inflight.get(userId);
      if (pending) return pending;

      const loading = load()
        .then((items) => {
          cache.setLibrary(userId, items);
          return items;
        })
        .finally(() => {
          inflight.delete(userId);
        });
      inflight.set(userId, loading);
      return loading;
    },

    invalidate(userId: string): void {
      entries.delete(userId);
    },

    clear(): void {
      entries.clear();
    },
  };

  return cache;
}
