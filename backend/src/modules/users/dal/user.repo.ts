/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - The storage contract for the user directory.
 * - Two implementations: PgUserRepo (runtime) and InMemUserRepo (tests, local runs).
 *
 * RULES:
 * - No AppError. Storage-level conflicts surface as LoginTakenError and the
 *   service maps them.
 * - No policies.
 * - Login uniqueness is enforced by storage (unique index / map check), so a
 *   race between two creates still yields exactly one user.
 */

import type { Gender, Role, User, UserCredentials, UserId } from '../user.types';

export type NewUser = {
  lastName: string;
  firstName: string;
  middleName: string | null;
  login: string;
  passwordHash: string;
  role: Role;
  gender: Gender;
  className: string | null;
  graduationYear: number | null;
};

/** Absent keys are left unchanged. `null` clears a nullable field. */
export type UserPatch = Partial<NewUser>;

export class LoginTakenError extends Error {
  constructor(public readonly login: string) {
    super('Login is already taken');
    this.name = 'LoginTakenError';
  }
}

export interface UserRepo {
  findById(id: UserId): Promise<User | undefined>;
  findByLogin(login: string): Promise<User | undefined>;

  /** The only read that returns the password hash. */
  findCredentialsByLogin(login: string): Promise<UserCredentials | undefined>;

  /** Newest first. */
  list(page: { offset: number; limit: number }): Promise<User[]>;
  count(): Promise<number>;

  /** Throws LoginTakenError. */
  insert(input: NewUser): Promise<User>;

  /** Throws LoginTakenError. Returns undefined when the user does not exist. */
  update(id: UserId, patch: UserPatch): Promise<User | undefined>;

  updatePasswordHash(id: UserId, passwordHash: string): Promise<boolean>;

  delete(id: UserId): Promise<boolean>;
}
