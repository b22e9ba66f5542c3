/**
 * src/modules/sessions/dal/session.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for auth_sessions.
 *
 * RULES:
 * - Read-only. No AppError.
 * - Returns raw rows; mapping to AuthSession happens in session.repo.ts.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { AuthSessionsTable } from '../../../shared/db/schema';

export type AuthSessionRow = Selectable<AuthSessionsTable>;

export async function selectSessionByIdSql(
  db: DbExecutor,
  sessionId: string,
): Promise<AuthSessionRow | undefined> {
  return db.selectFrom('auth_sessions').selectAll().where('id', '=', sessionId).executeTakeFirst();
}

export async function selectSessionByRefreshHashSql(
  db: DbExecutor,
  refreshTokenHash: string,
  opts: { forUpdate: boolean },
): Promise<AuthSessionRow | undefined> {
  const query = db
    .selectFrom('auth_sessions')
    .selectAll()
    .where('refresh_token_hash', '=', refreshTokenHash);

  return opts.forUpdate ? query.forUpdate().executeTakeFirst() : query.executeTakeFirst();
}

export async function selectActiveSessionsForUserSql(
  db: DbExecutor,
  userId: string,
  now: Date,
): Promise<AuthSessionRow[]> {
  return db
    .selectFrom('auth_sessions')
    .selectAll()
    .where('user_id', '=', userId)
    .where('revoked_at', 'is', null)
    .where('expires_at', '>', now)
    .orderBy('last_used_at', 'desc')
    .execute();
}
