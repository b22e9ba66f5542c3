/**
 * src/shared/db/migrations/index.ts
 *
 * Ordered registry of migrations. Add new files here; names sort lexically.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_auth_sessions';
import * as m0003 from './0003_totp_devices';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_auth_sessions': m0002,
  '0003_totp_devices': m0003,
};
