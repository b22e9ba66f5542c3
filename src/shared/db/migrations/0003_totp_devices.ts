/**
 * src/shared/db/migrations/0003_totp_devices.ts
 *
 * KEY CONSTRAINTS:
 * - UNIQUE(user_id): at most one TOTP device per user.
 * - backup_codes holds the UNUSED codes only; consuming one removes it.
 * - version is bumped on every write; backup-code consumption is a
 *   compare-and-swap on it.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await sql`
    CREATE TABLE totp_devices (
      id           UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id      UUID        NOT NULL UNIQUE REFERENCES users(id) ON DELETE CASCADE,
      secret       TEXT        NOT NULL,
      is_confirmed BOOLEAN     NOT NULL DEFAULT false,
      is_active    BOOLEAN     NOT NULL DEFAULT true,
      backup_codes TEXT[]      NOT NULL DEFAULT '{}',
      version      INTEGER     NOT NULL DEFAULT 0,
      created_at   TIMESTAMPTZ NOT NULL,
      confirmed_at TIMESTAMPTZ,
      last_used_at TIMESTAMPTZ
    );
  `.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await sql`DROP TABLE IF EXISTS totp_devices;`.execute(db);
}
