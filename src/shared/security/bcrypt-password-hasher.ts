/**
 * src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Stored user passwords are bcrypt hashes; verification happens here.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 * - const ok = await hasher.verify(password, user.passwordHash)
 *
 * RULES:
 * - verify() resolves false (never throws) for a hash bcrypt cannot parse, so a
 *   corrupt row reads as a wrong password.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$/;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    if (!BCRYPT_HASH_PATTERN.test(hash)) return false;
    return bcrypt.compare(plain, hash);
  }
}
