/**
 * src/modules/two-factor/dal/totp-device.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for totp_devices.
 *
 * RULES:
 * - Read-only. No AppError.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { TotpDevicesTable } from '../../../shared/db/schema';

export type TotpDeviceRow = Selectable<TotpDevicesTable>;

export async function selectTotpDeviceByUserSql(
  db: DbExecutor,
  userId: string,
): Promise<TotpDeviceRow | undefined> {
  return db.selectFrom('totp_devices').selectAll().where('user_id', '=', userId).executeTakeFirst();
}
