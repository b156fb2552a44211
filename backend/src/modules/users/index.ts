/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export type { User, UserId, Role, Gender, Actor } from './user.types';
export type { UserRepo, NewUser } from './dal/user.repo';
export { LoginTakenError } from './dal/user.repo';
export { toUserResponse } from './user.response';
export type { UserResponse } from './user.response';
