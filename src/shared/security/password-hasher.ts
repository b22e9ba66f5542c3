/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Credential verification depends on an interface, not bcrypt directly.
 * - The login flow only ever calls verify(); hash() exists for the dev seed
 *   and for tests that need a real stored hash.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
