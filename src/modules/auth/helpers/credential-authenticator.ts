/**
 * src/modules/auth/helpers/credential-authenticator.ts
 *
 * WHY:
 * - Step A of login: turn (email, password) into a verified, active user.
 * - The reason a check failed is returned for logging; callers must collapse
 *   every failure into the same invalid_credentials response.
 *
 * RULES:
 * - No HTTP concerns here.
 * - The password hash never leaves this helper.
 */

import type { PasswordHasher } from '../../../shared/security/password-hasher';
import { err, ok, type Result } from '../../../shared/result';
import type { User, UserRepository } from '../../users';

export type CredentialFailure = 'user_not_found' | 'wrong_password' | 'user_inactive';

export class CredentialAuthenticator {
  constructor(
    private readonly deps: {
      users: UserRepository;
      passwordHasher: PasswordHasher;
    },
  ) {}

  async authenticate(email: string, password: string): Promise<Result<User, CredentialFailure>> {
    const found = await this.deps.users.findByEmailWithPasswordHash(email);
    if (!found) return err('user_not_found');

    const { passwordHash, ...user } = found;

    const valid = await this.deps.passwordHasher.verify(password, passwordHash);
    if (!valid) return err('wrong_password');

    if (!user.isActive) return err('user_inactive');

    return ok(user);
  }
}
