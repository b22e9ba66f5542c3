/**
 * src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Refresh secrets are bearer credentials; we store only a hash so a DB leak
 *   doesn't expose usable tokens.
 * - HMAC-SHA256 keyed with the deployment signing key adds a server-side pepper:
 *   the auth_sessions table alone is not enough to brute-force secrets offline.
 *
 * HOW TO USE:
 * - Generate raw secret -> hash it -> store hash.
 * - When the client presents the secret -> hash -> look up by hash.
 *
 * RULES:
 * - Deterministic: same (input, key) → same output (required for DB lookup).
 * - No DB access. No business logic.
 */

import { createHmac } from 'node:crypto';

export interface TokenHasher {
  hash(rawToken: string): string;
}

export class HmacSha256TokenHasher implements TokenHasher {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(
        `HmacSha256TokenHasher: key must be at least 32 characters. Got ${key.length}.`,
      );
    }
    this.key = key;
  }

  /** Lowercase hex HMAC-SHA256 of `rawToken`. */
  hash(rawToken: string): string {
    return createHmac('sha256', this.key).update(rawToken).digest('hex');
  }
}
