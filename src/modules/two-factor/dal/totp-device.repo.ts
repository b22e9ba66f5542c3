/**
 * src/modules/two-factor/dal/totp-device.repo.ts
 *
 * WHY:
 * - Postgres-backed TotpDeviceRepository.
 *
 * KEY DESIGN:
 * - upsertConfirmed(): INSERT ... ON CONFLICT (user_id) DO UPDATE ... WHERE the
 *   existing device is not enabled. One statement, so two concurrent
 *   confirmations cannot both replace an enabled device. `(xmax = 0)` tells
 *   an insert apart from an update.
 * - updateIfVersion(): UPDATE ... WHERE version = $expected RETURNING *.
 *   Zero rows means a concurrent writer got there first.
 *
 * RULES:
 * - No transactions started here.
 * - No AppError.
 */

import { sql } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { TotpDevice } from '../two-factor.types';
import type { TotpDevicePatch, TotpDeviceRepository } from '../totp-device.repository';
import { selectTotpDeviceByUserSql, type TotpDeviceRow } from './totp-device.query-sql';

function toTotpDevice(row: TotpDeviceRow): TotpDevice {
  return {
    id: row.id,
    userId: row.user_id,
    secret: row.secret,
    isConfirmed: row.is_confirmed,
    isActive: row.is_active,
    backupCodes: row.backup_codes,
    version: row.version,
    createdAt: row.created_at,
    confirmedAt: row.confirmed_at,
    lastUsedAt: row.last_used_at,
  };
}

export class TotpDeviceRepo implements TotpDeviceRepository {
  constructor(private readonly db: DbExecutor) {}

  async findByUserId(userId: string): Promise<TotpDevice | undefined> {
    const row = await selectTotpDeviceByUserSql(this.db, userId);
    return row ? toTotpDevice(row) : undefined;
  }

  async upsertConfirmed(input: {
    userId: string;
    secret: string;
    backupCodes: string[];
    now: Date;
  }): Promise<{ device: TotpDevice; created: boolean } | undefined> {
    const row = await this.db
      .insertInto('totp_devices')
      .values({
        user_id: input.userId,
        secret: input.secret,
        is_confirmed: true,
        is_active: true,
        backup_codes: input.backupCodes,
        created_at: input.now,
        confirmed_at: input.now,
      })
      .onConflict((oc) =>
        oc
          .column('user_id')
          .doUpdateSet({
            secret: input.secret,
            is_confirmed: true,
            is_active: true,
            backup_codes: input.backupCodes,
            confirmed_at: input.now,
            version: sql<number>`totp_devices.version + 1`,
          })
          .where((eb) =>
            eb.or([
              eb('totp_devices.is_active', '=', false),
              eb('totp_devices.is_confirmed', '=', false),
            ]),
          ),
      )
      .returningAll()
      .returning(sql<boolean>`(xmax = 0)`.as('inserted'))
      .executeTakeFirst();

    if (!row) return undefined;

    return { device: toTotpDevice(row), created: row.inserted };
  }

  async updateIfVersion(
    userId: string,
    expectedVersion: number,
    patch: TotpDevicePatch,
  ): Promise<TotpDevice | undefined> {
    const row = await this.db
      .updateTable('totp_devices')
      .set({
        ...(patch.isActive !== undefined ? { is_active: patch.isActive } : {}),
        ...(patch.backupCodes !== undefined ? { backup_codes: patch.backupCodes } : {}),
        ...(patch.lastUsedAt !== undefined ? { last_used_at: patch.lastUsedAt } : {}),
        version: expectedVersion + 1,
      })
      .where('user_id', '=', userId)
      .where('version', '=', expectedVersion)
      .returningAll()
      .executeTakeFirst();

    return row ? toTotpDevice(row) : undefined;
  }

  async markUsed(userId: string, at: Date): Promise<void> {
    await this.db
      .updateTable('totp_devices')
      .set({ last_used_at: at })
      .where('user_id', '=', userId)
      .execute();
  }
}
