/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are owned by the surrounding product; this service reads them to
 *   verify credentials and to re-check `isActive` on every authenticated use.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - passwordHash only travels on UserWithPasswordHash (credential check path).
 */

export type UserId = string;

export type User = {
  id: UserId;
  email: string;
  name: string | null;
  isActive: boolean;

  createdAt: Date;
  updatedAt: Date;
};

export type UserWithPasswordHash = User & {
  passwordHash: string;
};

/** Public projection returned by /login and /me. */
export type UserSummary = {
  id: UserId;
  email: string;
  name: string;
};

export function toUserSummary(user: User): UserSummary {
  return { id: user.id, email: user.email, name: user.name ?? '' };
}
