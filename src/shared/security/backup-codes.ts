/**
 * src/shared/security/backup-codes.ts
 *
 * WHY:
 * - Backup codes are the recovery path when the authenticator device is lost.
 * - Pure functions: persistence (and the exactly-once guarantee under
 *   concurrency) belongs to the two-factor service + device repository.
 *
 * FORMAT:
 * - 8 uppercase hex characters (4 random bytes), e.g. "9F3A07C2".
 * - Matching is case-insensitive and ignores surrounding whitespace and dashes.
 */

import { randomBytes } from 'node:crypto';

export const BACKUP_CODE_BYTES = 4;

export function normalizeBackupCode(code: string): string {
  return code.replace(/[\s-]+/g, '').toUpperCase();
}

export function generateBackupCodes(count: number): string[] {
  const codes = new Set<string>();
  while (codes.size < count) {
    codes.add(randomBytes(BACKUP_CODE_BYTES).toString('hex').toUpperCase());
  }
  return [...codes];
}

export type BackupCodeConsumption = {
  consumed: boolean;
  /** Codes left after consumption (unchanged copy when nothing matched). */
  remaining: string[];
};

export function consumeBackupCode(codes: readonly string[], presented: string): BackupCodeConsumption {
  const wanted = normalizeBackupCode(presented);
  if (!wanted) return { consumed: false, remaining: [...codes] };

  const idx = codes.findIndex((c) => normalizeBackupCode(c) === wanted);
  if (idx === -1) return { consumed: false, remaining: [...codes] };

  return {
    consumed: true,
    remaining: [...codes.slice(0, idx), ...codes.slice(idx + 1)],
  };
}
