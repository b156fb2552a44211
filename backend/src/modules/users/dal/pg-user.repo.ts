/**
 * backend/src/modules/users/dal/pg-user.repo.ts
 *
 * WHY:
 * - Kysely/Postgres implementation of UserRepo.
 * - Reads go through queries/user.queries.ts (row → domain mapping lives there).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 */

import { sql } from 'kysely';
import type { Updateable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/db.types';
import { isUniqueViolation } from '../../../shared/db/db-errors';
import type { User, UserCredentials, UserId } from '../user.types';
import {
  countUsers,
  getUserById,
  getUserByLogin,
  getUserCredentialsByLogin,
  listUsers,
  toUser,
} from '../queries/user.queries';
import { LoginTakenError } from './user.repo';
import type { NewUser, UserPatch, UserRepo } from './user.repo';

const LOGIN_UNIQUE_CONSTRAINT = 'users_login_key';

function toUpdateRow(patch: UserPatch): Updateable<UsersTable> {
  const row: Updateable<UsersTable> = {};

  if (patch.lastName !== undefined) row.last_name = patch.lastName;
  if (patch.firstName !== undefined) row.first_name = patch.firstName;
  if (patch.middleName !== undefined) row.middle_name = patch.middleName;
  if (patch.login !== undefined) row.login = patch.login;
  if (patch.passwordHash !== undefined) row.password_hash = patch.passwordHash;
  if (patch.role !== undefined) row.role = patch.role;
  if (patch.gender !== undefined) row.gender = patch.gender;
  if (patch.className !== undefined) row.class_name = patch.className;
  if (patch.graduationYear !== undefined) row.graduation_year = patch.graduationYear;

  return row;
}

export class PgUserRepo implements UserRepo {
  constructor(private readonly db: DbExecutor) {}

  findById(id: UserId): Promise<User | undefined> {
    return getUserById(this.db, id);
  }

  findByLogin(login: string): Promise<User | undefined> {
    return getUserByLogin(this.db, login);
  }

  findCredentialsByLogin(login: string): Promise<UserCredentials | undefined> {
    return getUserCredentialsByLogin(this.db, login);
  }

  list(page: { offset: number; limit: number }): Promise<User[]> {
    return listUsers(this.db, page);
  }

  count(): Promise<number> {
    return countUsers(this.db);
  }

  async insert(input: NewUser): Promise<User> {
    try {
      const row = await this.db
        .insertInto('users')
        .values({
          last_name: input.lastName,
          first_name: input.firstName,
          middle_name: input.middleName,
          login: input.login,
          password_hash: input.passwordHash,
          role: input.role,
          gender: input.gender,
          class_name: input.className,
          graduation_year: input.graduationYear,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return toUser(row);
    } catch (err) {
      if (isUniqueViolation(err, LOGIN_UNIQUE_CONSTRAINT)) throw new LoginTakenError(input.login);
      throw err;
    }
  }

  async update(id: UserId, patch: UserPatch): Promise<User | undefined> {
    try {
      const row = await this.db
        .updateTable('users')
        .set({ ...toUpdateRow(patch), updated_at: sql<Date>`now()` })
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();

      return row ? toUser(row) : undefined;
    } catch (err) {
      if (isUniqueViolation(err, LOGIN_UNIQUE_CONSTRAINT) && patch.login !== undefined) {
        throw new LoginTakenError(patch.login);
      }
      throw err;
    }
  }

  async updatePasswordHash(id: UserId, passwordHash: string): Promise<boolean> {
    const result = await this.db
      .updateTable('users')
      .set({ password_hash: passwordHash, updated_at: sql<Date>`now()` })
      .where('id', '=', id)
      .executeTakeFirst();

    return result.numUpdatedRows > 0n;
  }

  async delete(id: UserId): Promise<boolean> {
    const result = await this.db.deleteFrom('users').where('id', '=', id).executeTakeFirst();
    return result.numDeletedRows > 0n;
  }
}
