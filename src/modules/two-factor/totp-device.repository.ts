/**
 * src/modules/two-factor/totp-device.repository.ts
 *
 * Storage port for TOTP devices.
 * Postgres implementation: dal/totp-device.repo.ts. Tests use an in-memory fake.
 *
 * CONCURRENCY CONTRACT:
 * - upsertConfirmed() never overwrites an ENABLED device; it resolves undefined
 *   instead (the caller reports "already enabled").
 * - updateIfVersion() applies the patch only if the stored version still equals
 *   `expectedVersion`, bumping it by one. undefined means someone else wrote
 *   first: re-read and retry.
 */

import type { TotpDevice } from './two-factor.types';

export type TotpDevicePatch = {
  isActive?: boolean;
  backupCodes?: string[];
  lastUsedAt?: Date;
};

export interface TotpDeviceRepository {
  findByUserId(userId: string): Promise<TotpDevice | undefined>;

  upsertConfirmed(input: {
    userId: string;
    secret: string;
    backupCodes: string[];
    now: Date;
  }): Promise<{ device: TotpDevice; created: boolean } | undefined>;

  updateIfVersion(
    userId: string,
    expectedVersion: number,
    patch: TotpDevicePatch,
  ): Promise<TotpDevice | undefined>;

  /** last_used_at only; does not bump version. */
  markUsed(userId: string, at: Date): Promise<void>;
}
