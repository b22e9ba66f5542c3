/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Short-lived security state (pending two-factor challenges, rate-limit
 *   counters) must be fast, expire on its own and be shared across instances.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.del(key) -> true only for the caller that actually removed the key
 *   (single-use claims rely on this)
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;

  /**
   * Removes the key. Resolves true if a live entry was removed, false if it was
   * absent or already expired. Atomic: of two concurrent deletes, one wins.
   */
  del(key: string): Promise<boolean>;

  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;
}
