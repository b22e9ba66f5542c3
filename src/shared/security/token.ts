/**
 * src/shared/security/token.ts
 *
 * WHY:
 * - Token generation should be consistent and strong across the system.
 * - Raw tokens (refresh secrets, two-factor challenge tokens) must be URL-safe.
 *
 * HOW TO USE:
 * - const secret = generateSecureToken(REFRESH_SECRET_BYTES)
 * - Hand the raw value to the client, store only its hash.
 */

import { randomBytes } from 'node:crypto';

/** 48 random bytes → 64 base64url characters. */
export const REFRESH_SECRET_BYTES = 48;

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
