/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 * - password_hash only leaves through getUserCredentialsByLogin().
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countUsersSql,
  selectUserByIdSql,
  selectUserByLoginSql,
  selectUsersPageSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import { isGender, isRole } from '../user.types';
import type { User, UserCredentials } from '../user.types';

export function toUser(row: UserRow): User {
  // CHECK constraints guarantee these; a mismatch means the schema drifted.
  if (!isRole(row.role)) throw new Error(`users.role has unexpected value for user ${row.id}`);
  if (!isGender(row.gender)) throw new Error(`users.gender has unexpected value for user ${row.id}`);

  return {
    id: row.id,
    lastName: row.last_name,
    firstName: row.first_name,
    middleName: row.middle_name ?? null,
    login: row.login,
    role: row.role,
    gender: row.gender,
    className: row.class_name ?? null,
    graduationYear: row.graduation_year ?? null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserByLogin(db: DbExecutor, login: string): Promise<User | undefined> {
  const row = await selectUserByLoginSql(db, login);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserCredentialsByLogin(
  db: DbExecutor,
  login: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByLoginSql(db, login);
  if (!row) return undefined;
  return { user: toUser(row), passwordHash: row.password_hash };
}

export async function listUsers(
  db: DbExecutor,
  page: { offset: number; limit: number },
): Promise<User[]> {
  const rows = await selectUsersPageSql(db, page);
  return rows.map(toUser);
}

export async function countUsers(db: DbExecutor): Promise<number> {
  return countUsersSql(db);
}
