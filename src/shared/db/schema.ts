/**
 * src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs the table shapes to type-check queries.
 * - Kept in lockstep with src/shared/db/migrations by hand: every migration
 *   that changes a table updates the matching interface here.
 *
 * RULES:
 * - snake_case column names, exactly as in Postgres.
 * - Timestamps are written explicitly by the services (injected Clock), so
 *   they are plain Date columns rather than DB defaults.
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date, Date>;
type NullableTimestamp = ColumnType<Date | null, Date | null | undefined, Date | null>;

export interface UsersTable {
  id: Generated<string>;
  email: string;
  name: string | null;
  password_hash: string;
  is_active: Generated<boolean>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface AuthSessionsTable {
  id: Generated<string>;
  user_id: string;
  refresh_token_hash: string;
  created_at: Timestamp;
  last_used_at: Timestamp;
  expires_at: Timestamp;
  ip_address: string | null;
  user_agent: string | null;
  revoked_at: NullableTimestamp;
  revoked_reason: string | null;
  rotated_from: string | null;
}

export interface TotpDevicesTable {
  id: Generated<string>;
  user_id: string;
  secret: string;
  is_confirmed: boolean;
  is_active: boolean;
  backup_codes: ColumnType<string[], string[], string[]>;
  version: Generated<number>;
  created_at: Timestamp;
  confirmed_at: NullableTimestamp;
  last_used_at: NullableTimestamp;
}

export interface DB {
  users: UsersTable;
  auth_sessions: AuthSessionsTable;
  totp_devices: TotpDevicesTable;
}
