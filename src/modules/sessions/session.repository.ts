/**
 * src/modules/sessions/session.repository.ts
 *
 * Storage port for AuthSession rows.
 * Postgres implementation: dal/session.repo.ts. Tests use an in-memory fake
 * that serializes transactions.
 *
 * CONCURRENCY CONTRACT:
 * - transaction(fn) runs fn against a repository bound to one transaction.
 * - findByRefreshHash(hash, { forUpdate: true }) inside a transaction holds a
 *   row lock until commit: concurrent refreshes of one secret are serialized.
 * - revokeIfActive() is a compare-and-swap on revoked_at IS NULL; it returns
 *   false when another writer revoked first.
 */

import type { AuthSession, NewAuthSession, RevokeReason } from './session.types';

export interface SessionRepository {
  transaction<T>(fn: (repo: SessionRepository) => Promise<T>): Promise<T>;

  insert(input: NewAuthSession): Promise<AuthSession>;

  findById(sessionId: string): Promise<AuthSession | undefined>;
  findByRefreshHash(
    refreshTokenHash: string,
    opts?: { forUpdate?: boolean },
  ): Promise<AuthSession | undefined>;

  /** Non-revoked, unexpired sessions of a user, most recently used first. */
  listActiveForUser(userId: string, now: Date): Promise<AuthSession[]>;

  /** Updates last_used_at (and client telemetry when given). Never touches revocation. */
  touch(
    sessionId: string,
    input: { lastUsedAt: Date; ipAddress?: string | null; userAgent?: string | null },
  ): Promise<void>;

  revokeIfActive(
    sessionId: string,
    input: { revokedAt: Date; reason: RevokeReason },
  ): Promise<boolean>;

  /** Revokes every non-revoked session of the user except `exceptSessionId`. Returns the count. */
  revokeAllForUser(
    userId: string,
    input: { revokedAt: Date; reason: RevokeReason; exceptSessionId?: string },
  ): Promise<number>;
}
