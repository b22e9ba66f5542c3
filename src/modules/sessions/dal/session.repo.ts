/**
 * src/modules/sessions/dal/session.repo.ts
 *
 * WHY:
 * - Postgres-backed SessionRepository.
 *
 * KEY DESIGN:
 * - findByRefreshHash({ forUpdate: true }) issues SELECT ... FOR UPDATE so the
 *   refresh rotator holds the presented row until its transaction commits.
 * - revokeIfActive(): single UPDATE ... WHERE revoked_at IS NULL. No separate
 *   SELECT, so two writers can never both "win" the revocation. Revocation is
 *   monotonic because every revoke statement carries the same guard.
 * - transaction(): nested calls reuse the bound transaction (Kysely cannot
 *   start a transaction on a Transaction).
 *
 * RULES:
 * - No AppError.
 * - No policies (expiry/idle decisions live in policies/session-activity.policy.ts).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { SessionRepository } from '../session.repository';
import {
  REVOKE_REASONS,
  type AuthSession,
  type NewAuthSession,
  type RevokeReason,
} from '../session.types';
import {
  selectActiveSessionsForUserSql,
  selectSessionByIdSql,
  selectSessionByRefreshHashSql,
  type AuthSessionRow,
} from './session.query-sql';

function toRevokeReason(value: string | null): RevokeReason | null {
  if (value === null) return null;
  return REVOKE_REASONS.find((r) => r === value) ?? null;
}

function toAuthSession(row: AuthSessionRow): AuthSession {
  return {
    id: row.id,
    userId: row.user_id,
    refreshTokenHash: row.refresh_token_hash,
    createdAt: row.created_at,
    lastUsedAt: row.last_used_at,
    expiresAt: row.expires_at,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    revokedAt: row.revoked_at,
    revokedReason: toRevokeReason(row.revoked_reason),
    rotatedFrom: row.rotated_from,
  };
}

export class SessionRepo implements SessionRepository {
  constructor(
    private readonly db: DbExecutor,
    private readonly inTransaction = false,
  ) {}

  withDb(db: DbExecutor): SessionRepo {
    return new SessionRepo(db, true);
  }

  async transaction<T>(fn: (repo: SessionRepository) => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn(this);
    return this.db.transaction().execute((trx) => fn(this.withDb(trx)));
  }

  async insert(input: NewAuthSession): Promise<AuthSession> {
    const row = await this.db
      .insertInto('auth_sessions')
      .values({
        user_id: input.userId,
        refresh_token_hash: input.refreshTokenHash,
        created_at: input.createdAt,
        last_used_at: input.createdAt,
        expires_at: input.expiresAt,
        ip_address: input.ipAddress,
        user_agent: input.userAgent,
        rotated_from: input.rotatedFrom,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toAuthSession(row);
  }

  async findById(sessionId: string): Promise<AuthSession | undefined> {
    const row = await selectSessionByIdSql(this.db, sessionId);
    return row ? toAuthSession(row) : undefined;
  }

  async findByRefreshHash(
    refreshTokenHash: string,
    opts: { forUpdate?: boolean } = {},
  ): Promise<AuthSession | undefined> {
    const row = await selectSessionByRefreshHashSql(this.db, refreshTokenHash, {
      forUpdate: opts.forUpdate === true,
    });
    return row ? toAuthSession(row) : undefined;
  }

  async listActiveForUser(userId: string, now: Date): Promise<AuthSession[]> {
    const rows = await selectActiveSessionsForUserSql(this.db, userId, now);
    return rows.map(toAuthSession);
  }

  async touch(
    sessionId: string,
    input: { lastUsedAt: Date; ipAddress?: string | null; userAgent?: string | null },
  ): Promise<void> {
    await this.db
      .updateTable('auth_sessions')
      .set({
        last_used_at: input.lastUsedAt,
        ...(input.ipAddress !== undefined ? { ip_address: input.ipAddress } : {}),
        ...(input.userAgent !== undefined ? { user_agent: input.userAgent } : {}),
      })
      .where('id', '=', sessionId)
      .execute();
  }

  async revokeIfActive(
    sessionId: string,
    input: { revokedAt: Date; reason: RevokeReason },
  ): Promise<boolean> {
    const result = await this.db
      .updateTable('auth_sessions')
      .set({ revoked_at: input.revokedAt, revoked_reason: input.reason })
      .where('id', '=', sessionId)
      .where('revoked_at', 'is', null)
      .executeTakeFirst();

    return Number(result.numUpdatedRows) > 0;
  }

  async revokeAllForUser(
    userId: string,
    input: { revokedAt: Date; reason: RevokeReason; exceptSessionId?: string },
  ): Promise<number> {
    let query = this.db
      .updateTable('auth_sessions')
      .set({ revoked_at: input.revokedAt, revoked_reason: input.reason })
      .where('user_id', '=', userId)
      .where('revoked_at', 'is', null);

    if (input.exceptSessionId) {
      query = query.where('id', '<>', input.exceptSessionId);
    }

    const result = await query.executeTakeFirst();
    return Number(result.numUpdatedRows);
  }
}
