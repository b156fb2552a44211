/**
 * backend/src/modules/users/dal/inmem-user.repo.ts
 *
 * WHY:
 * - Allows tests (and local runs without Postgres) to exercise the full stack.
 *
 * HOW TO USE:
 * - const repo = new InMemUserRepo()
 *
 * NOTES:
 * - Every method completes its read-check-write synchronously before returning
 *   a promise, so concurrent callers cannot interleave inside one operation.
 * - Returned users are copies; mutating them does not touch the store.
 */

import { randomUUID } from 'node:crypto';

import type { Clock } from '../../../shared/clock';
import { systemClock } from '../../../shared/clock';
import type { User, UserCredentials, UserId } from '../user.types';
import { LoginTakenError } from './user.repo';
import type { NewUser, UserPatch, UserRepo } from './user.repo';

type StoredUser = {
  seq: number;
  user: User;
  passwordHash: string;
};

export class InMemUserRepo implements UserRepo {
  private readonly byId = new Map<UserId, StoredUser>();
  private seq = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  private findStoredByLogin(login: string): StoredUser | undefined {
    for (const stored of this.byId.values()) {
      if (stored.user.login === login) return stored;
    }
    return undefined;
  }

  findById(id: UserId): Promise<User | undefined> {
    const stored = this.byId.get(id);
    return Promise.resolve(stored ? { ...stored.user } : undefined);
  }

  findByLogin(login: string): Promise<User | undefined> {
    const stored = this.findStoredByLogin(login);
    return Promise.resolve(stored ? { ...stored.user } : undefined);
  }

  findCredentialsByLogin(login: string): Promise<UserCredentials | undefined> {
    const stored = this.findStoredByLogin(login);
    return Promise.resolve(
      stored ? { user: { ...stored.user }, passwordHash: stored.passwordHash } : undefined,
    );
  }

  list(page: { offset: number; limit: number }): Promise<User[]> {
    const sorted = [...this.byId.values()].sort(
      (a, b) => b.user.createdAt.getTime() - a.user.createdAt.getTime() || b.seq - a.seq,
    );

    return Promise.resolve(
      sorted.slice(page.offset, page.offset + page.limit).map((s) => ({ ...s.user })),
    );
  }

  count(): Promise<number> {
    return Promise.resolve(this.byId.size);
  }

  insert(input: NewUser): Promise<User> {
    if (this.findStoredByLogin(input.login)) {
      return Promise.reject(new LoginTakenError(input.login));
    }

    const now = this.clock();
    const user: User = {
      id: randomUUID(),
      lastName: input.lastName,
      firstName: input.firstName,
      middleName: input.middleName,
      login: input.login,
      role: input.role,
      gender: input.gender,
      className: input.className,
      graduationYear: input.graduationYear,
      createdAt: now,
      updatedAt: now,
    };

    this.seq += 1;
    this.byId.set(user.id, { seq: this.seq, user, passwordHash: input.passwordHash });

    return Promise.resolve({ ...user });
  }

  update(id: UserId, patch: UserPatch): Promise<User | undefined> {
    const stored = this.byId.get(id);
    if (!stored) return Promise.resolve(undefined);

    if (patch.login !== undefined && patch.login !== stored.user.login) {
      const holder = this.findStoredByLogin(patch.login);
      if (holder) return Promise.reject(new LoginTakenError(patch.login));
    }

    const { passwordHash, ...fields } = patch;
    const next: User = { ...stored.user, updatedAt: this.clock() };

    if (fields.lastName !== undefined) next.lastName = fields.lastName;
    if (fields.firstName !== undefined) next.firstName = fields.firstName;
    if (fields.middleName !== undefined) next.middleName = fields.middleName;
    if (fields.login !== undefined) next.login = fields.login;
    if (fields.role !== undefined) next.role = fields.role;
    if (fields.gender !== undefined) next.gender = fields.gender;
    if (fields.className !== undefined) next.className = fields.className;
    if (fields.graduationYear !== undefined) next.graduationYear = fields.graduationYear;

    this.byId.set(id, {
      seq: stored.seq,
      user: next,
      passwordHash: passwordHash ?? stored.passwordHash,
    });

    return Promise.resolve({ ...next });
  }

  updatePasswordHash(id: UserId, passwordHash: string): Promise<boolean> {
    const stored = this.byId.get(id);
    if (!stored) return Promise.resolve(false);

    this.byId.set(id, { ...stored, passwordHash });
    return Promise.resolve(true);
  }

  delete(id: UserId): Promise<boolean> {
    return Promise.resolve(this.byId.delete(id));
  }
}
