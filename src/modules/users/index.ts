/**
 * src/modules/users/index.ts
 *
 * Public surface of the users module. Other modules import from here, never
 * from ./dal.
 */

export type { User, UserId, UserWithPasswordHash, UserSummary } from './user.types';
export { toUserSummary } from './user.types';
export type { UserRepository } from './user.repository';
