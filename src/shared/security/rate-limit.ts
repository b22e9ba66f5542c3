/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Password and second-factor guessing must be throttled:
 *   - login: 5 / 15min per email, 20 / 15min per IP
 *   - two-factor code attempts: 5 / 15min per user
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: 'login:ip:1.2.3.4', limit: 20, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check, not check-then-INCR. Two concurrent requests both
 *   increment; the one that pushes over the limit sees a value > limit.
 *
 * DISABLING:
 * - `disabled: true` skips all checks (set by the composition root for tests).
 * - Never check NODE_ENV here.
 */

import type { Cache } from '../cache/cache';

export type RateLimitRule = Readonly<{ limit: number; windowSeconds: number }>;

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts: { prefix?: string; disabled?: boolean } = {},
  ) {}

  private buildKey(key: string): string {
    return this.opts.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /** Increments the counter for `key`; throws RateLimitError once it exceeds `limit`. */
  async hitOrThrow(input: { key: string } & RateLimitRule): Promise<void> {
    if (this.opts.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }

  /** Clears the counter, e.g. after a successful login. */
  async reset(key: string): Promise<void> {
    if (this.opts.disabled) return;
    await this.cache.del(this.buildKey(key));
  }
}
