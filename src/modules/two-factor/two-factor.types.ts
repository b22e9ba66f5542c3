/**
 * src/modules/two-factor/two-factor.types.ts
 *
 * WHY:
 * - Domain types for TOTP devices (one per user).
 *
 * RULES:
 * - Two-factor is ENABLED iff isActive AND isConfirmed.
 * - backupCodes holds unused codes only, in issue order.
 * - version increases on every write that changes backupCodes or isActive;
 *   writers compare-and-swap on it.
 */

export type TotpDevice = {
  id: string;
  userId: string;
  secret: string;
  isConfirmed: boolean;
  isActive: boolean;
  backupCodes: string[];
  version: number;
  createdAt: Date;
  confirmedAt: Date | null;
  lastUsedAt: Date | null;
};

export type TwoFactorStatus = {
  isEnabled: boolean;
  backupCodesRemaining: number;
  lastUsedAt: Date | null;
  confirmedAt: Date | null;
  createdAt: Date | null;
};

/** Returned by setup; nothing is persisted until confirmation. */
export type TwoFactorEnrollment = {
  secret: string;
  provisioningUri: string;
  qrCode: string;
  backupCodes: string[];
};

export type SecondFactorInput = {
  code: string;
  useBackup: boolean;
};

export type SecondFactorFailure = 'not_enabled' | 'invalid_code' | 'invalid_backup_code';

export type SecondFactorSuccess = {
  method: 'totp' | 'backup_code';
  backupCodesRemaining: number;
};
