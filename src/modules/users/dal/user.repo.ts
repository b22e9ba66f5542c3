/**
 * src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Postgres-backed UserRepository.
 * - Reads go through user.query-sql.ts; the only write is the dev seed insert.
 *
 * RULES:
 * - No transactions started here.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { User, UserWithPasswordHash } from '../user.types';
import type { UserRepository } from '../user.repository';
import { selectUserByEmailSql, selectUserByIdSql, type UserRow } from './user.query-sql';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name ?? null,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class UserRepo implements UserRepository {
  constructor(private readonly db: DbExecutor) {}

  async findById(userId: string): Promise<User | undefined> {
    const row = await selectUserByIdSql(this.db, userId);
    return row ? toUser(row) : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const row = await selectUserByEmailSql(this.db, email);
    return row ? toUser(row) : undefined;
  }

  async findByEmailWithPasswordHash(email: string): Promise<UserWithPasswordHash | undefined> {
    const row = await selectUserByEmailSql(this.db, email);
    if (!row) return undefined;
    return { ...toUser(row), passwordHash: row.password_hash };
  }

  async insertUser(params: {
    email: string;
    name: string | null;
    passwordHash: string;
  }): Promise<User> {
    const row = await this.db
      .insertInto('users')
      .values({
        email: params.email.toLowerCase(),
        name: params.name,
        password_hash: params.passwordHash,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toUser(row);
  }
}
