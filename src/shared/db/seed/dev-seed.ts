/**
 * src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - one active user with a bcrypt password (if missing)
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Stores only the password hash.
 * - Never logs the password.
 */

import type { Logger } from '../../logger/logger';
import type { PasswordHasher } from '../../security/password-hasher';
import type { User, UserRepository } from '../../../modules/users';

type DevSeedOptions = {
  email: string;
  password: string;
};

export async function runDevSeed(opts: {
  users: UserRepository;
  passwordHasher: PasswordHasher;
  logger: Logger;
  options: DevSeedOptions;
}): Promise<{ user: User; created: boolean }> {
  const { users, passwordHasher, logger, options } = opts;

  const flow = 'seed.dev';
  const email = options.email.trim().toLowerCase();

  const existing = await users.findByEmail(email);
  if (existing) {
    logger.info('seed.user.exists', { flow, userId: existing.id, email });
    return { user: existing, created: false };
  }

  const user = await users.insertUser({
    email,
    name: 'Dev User',
    passwordHash: await passwordHasher.hash(options.password),
  });

  logger.info('seed.user.created', { flow, userId: user.id, email });

  return { user, created: true };
}
