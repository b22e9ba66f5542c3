/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and single-instance deployments) to run without Redis.
 *
 * EXPIRY:
 * - Entries are checked on every read (an expired entry is never returned).
 * - Optionally, `sweepIntervalMs` starts a background sweep that drops expired
 *   entries nobody reads again. The timer is unref'd; call close() to stop it.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache({ now: () => clock.now().getTime() })
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly now: () => number;
  private readonly sweeper: NodeJS.Timeout | null;

  constructor(opts: { now?: () => number; sweepIntervalMs?: number } = {}) {
    this.now = opts.now ?? (() => Date.now());

    if (opts.sweepIntervalMs && opts.sweepIntervalMs > 0) {
      this.sweeper = setInterval(() => this.sweep(), opts.sweepIntervalMs);
      this.sweeper.unref();
    } else {
      this.sweeper = null;
    }
  }

  private isExpired(entry: StringEntry): boolean {
    return entry.expiresAtMs !== null && entry.expiresAtMs <= this.now();
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (this.isExpired(entry)) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  /** Drops every expired entry. Returns how many were removed. */
  sweep(): number {
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (this.isExpired(entry)) {
        this.store.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<boolean> {
    const live = this.getEntry(key) !== null;
    this.store.delete(key);
    return Promise.resolve(live);
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Same as Redis INCR + EXPIRE-if-no-TTL: the window starts at the first hit.
    const expiresAtMs =
      entry?.expiresAtMs ?? (opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null);

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  close(): Promise<void> {
    if (this.sweeper) clearInterval(this.sweeper);
    return Promise.resolve();
  }
}
