/**
 * src/shared/db/migrations/0002_auth_sessions.ts
 *
 * KEY CONSTRAINTS:
 * - refresh_token_hash UNIQUE: one row per issued refresh secret.
 * - rotated_from references the parent session; ON DELETE SET NULL so lineage
 *   never blocks cleanup of old rows.
 * - Rows are never deleted by the service; revoked_at is set exactly once.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await sql`
    CREATE TABLE auth_sessions (
      id                 UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id            UUID        NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      refresh_token_hash TEXT        NOT NULL UNIQUE,
      created_at         TIMESTAMPTZ NOT NULL,
      last_used_at       TIMESTAMPTZ NOT NULL,
      expires_at         TIMESTAMPTZ NOT NULL,
      ip_address         TEXT,
      user_agent         TEXT,
      revoked_at         TIMESTAMPTZ,
      revoked_reason     TEXT,
      rotated_from       UUID        REFERENCES auth_sessions(id) ON DELETE SET NULL
    );
  `.execute(db);

  await sql`
    CREATE INDEX idx_auth_sessions_user_active
      ON auth_sessions (user_id, last_used_at DESC)
      WHERE revoked_at IS NULL;
  `.execute(db);

  await sql`CREATE INDEX idx_auth_sessions_expires_at ON auth_sessions (expires_at);`.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await sql`DROP INDEX IF EXISTS idx_auth_sessions_expires_at;`.execute(db);
  await sql`DROP INDEX IF EXISTS idx_auth_sessions_user_active;`.execute(db);
  await sql`DROP TABLE IF EXISTS auth_sessions;`.execute(db);
}
