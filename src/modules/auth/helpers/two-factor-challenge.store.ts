/**
 * src/modules/auth/helpers/two-factor-challenge.store.ts
 *
 * WHY:
 * - Holds the PENDING_2FA state between the password step and the code step.
 * - Lives in the TTL cache (Redis or InMemCache), so a challenge expires on
 *   its own and is visible to every instance.
 *
 * RULES:
 * - The temp token is random (256 bits); the cache key embeds it.
 * - peek() never consumes: a wrong code keeps the challenge until its TTL.
 * - claim() is the single-use gate: of two concurrent claims exactly one
 *   resolves true (Cache.del contract).
 * - A stored value that does not parse is treated as absent.
 */

import { z } from 'zod';

import type { Cache } from '../../../shared/cache/cache';
import { generateSecureToken } from '../../../shared/security/token';
import type { PendingTwoFactorChallenge } from '../auth.types';
import {
  TWO_FACTOR_CHALLENGE_KEY_PREFIX,
  TWO_FACTOR_CHALLENGE_TOKEN_BYTES,
} from '../auth.constants';

const PendingChallengeSchema = z.object({
  userId: z.string().min(1),
  rememberMe: z.boolean(),
});

function challengeKey(token: string): string {
  return `${TWO_FACTOR_CHALLENGE_KEY_PREFIX}${token}`;
}

export class TwoFactorChallengeStore {
  constructor(
    private readonly cache: Cache,
    private readonly opts: { ttlSeconds: number },
  ) {}

  async create(challenge: PendingTwoFactorChallenge): Promise<string> {
    const token = generateSecureToken(TWO_FACTOR_CHALLENGE_TOKEN_BYTES);

    await this.cache.set(challengeKey(token), JSON.stringify(challenge), {
      ttlSeconds: this.opts.ttlSeconds,
    });

    return token;
  }

  async peek(token: string): Promise<PendingTwoFactorChallenge | undefined> {
    const raw = await this.cache.get(challengeKey(token));
    if (raw === null) return undefined;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      return undefined;
    }

    const parsed = PendingChallengeSchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
  }

  /** Removes the challenge. True only for the caller that removed it. */
  async claim(token: string): Promise<boolean> {
    return this.cache.del(challengeKey(token));
  }
}
