import { describe, it, expect } from 'vitest';

import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { RateLimitError, RateLimiter } from '../../../src/shared/security/rate-limit';
import { ManualClock } from '../../helpers/manual-clock';

const RULE = { key: 'login:ip:203.0.113.7', limit: 3, windowSeconds: 900 };

function makeLimiter(opts: { disabled?: boolean } = {}) {
  const clock = new ManualClock();
  const cache = new InMemCache({ now: () => clock.now().getTime() });
  return { clock, cache, limiter: new RateLimiter(cache, { prefix: 'rl', ...opts }) };
}

describe('RateLimiter', () => {
  it('allows up to the limit and throws on the next hit', async () => {
    const { limiter } = makeLimiter();

    for (let i = 0; i < 3; i++) await limiter.hitOrThrow(RULE);

    const error = await limiter.hitOrThrow(RULE).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ key: 'rl:login:ip:203.0.113.7', limit: 3, windowSeconds: 900 });
  });

  it('starts over once the window passes', async () => {
    const { clock, limiter } = makeLimiter();
    for (let i = 0; i < 3; i++) await limiter.hitOrThrow(RULE);

    clock.advanceSeconds(900);

    await expect(limiter.hitOrThrow(RULE)).resolves.toBeUndefined();
  });

  it('reset clears the counter', async () => {
    const { cache, limiter } = makeLimiter();
    for (let i = 0; i < 3; i++) await limiter.hitOrThrow(RULE);

    await limiter.reset(RULE.key);

    expect(await cache.get('rl:login:ip:203.0.113.7')).toBeNull();
    await expect(limiter.hitOrThrow(RULE)).resolves.toBeUndefined();
  });

  it('does nothing when disabled', async () => {
    const { cache, limiter } = makeLimiter({ disabled: true });

    for (let i = 0; i < 10; i++) await limiter.hitOrThrow(RULE);

    expect(cache.size).toBe(0);
  });
});
