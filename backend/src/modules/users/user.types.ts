/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Role drives the permission set embedded in access tokens.
 *
 * RULES:
 * - Keep aligned with DB schema (CHECK constraints in 0001_users).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries and the HTTP mapper.
 * - passwordHash is NOT part of User. It only travels through UserCredentials.
 */

export const USER_ROLES = ['admin', 'teacher', 'student', 'staff'] as const;
export type Role = (typeof USER_ROLES)[number];

export const GENDERS = ['male', 'female'] as const;
export type Gender = (typeof GENDERS)[number];

export type UserId = string;

export type User = {
  id: UserId;
  lastName: string;
  firstName: string;
  middleName: string | null;
  login: string;
  role: Role;
  gender: Gender;
  className: string | null;
  graduationYear: number | null;

  createdAt: Date;
  updatedAt: Date;
};

export type UserCredentials = {
  user: User;
  passwordHash: string;
};

/** Who is performing a directory operation. Taken from a verified access token. */
export type Actor = Readonly<{
  userId: UserId;
  role: Role;
}>;

export function isRole(value: string): value is Role {
  return USER_ROLES.some((r) => r === value);
}

export function isGender(value: string): value is Gender {
  return GENDERS.some((g) => g === value);
}
