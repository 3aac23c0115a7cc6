/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev without Redis) to run without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache(() => fakeNow) for deterministic expiry
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();

  constructor(private readonly clock: () => number = Date.now) {}

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.clock()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? this.clock() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Like the Redis adapter: the window starts at the first hit and is not extended.
    const expiresAtMs =
      entry?.expiresAtMs ?? (opts?.ttlSeconds ? this.clock() + opts.ttlSeconds * 1000 : null);

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  close(): Promise<void> {
    this.store.clear();
    return Promise.resolve();
  }
}
