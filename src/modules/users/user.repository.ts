/**
 * src/modules/users/user.repository.ts
 *
 * Port used by auth, sessions and two-factor to read users.
 * Postgres implementation: dal/user.repo.ts. Tests use an in-memory fake.
 */

import type { User, UserWithPasswordHash } from './user.types';

export interface UserRepository {
  findById(userId: string): Promise<User | undefined>;

  /** Email match is case-insensitive. */
  findByEmail(email: string): Promise<User | undefined>;

  /** Credential-check read; the only path that exposes the password hash. */
  findByEmailWithPasswordHash(email: string): Promise<UserWithPasswordHash | undefined>;

  /** Dev seed only. Email must be unique (DB constraint). */
  insertUser(params: {
    email: string;
    name: string | null;
    passwordHash: string;
  }): Promise<User>;
}
