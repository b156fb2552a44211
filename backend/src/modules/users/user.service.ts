/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Admin-only user directory: list / get / create / update / delete.
 * - Credential changes end the user's sessions: a password change or a delete
 *   revokes every refresh token the user holds.
 *
 * RULES:
 * - assertAdmin() runs first in every operation, before any storage access.
 * - Never store/log raw passwords. Only the PasswordHasher sees them.
 * - Storage conflicts (LoginTakenError) are mapped to 409 here, not in the DAL.
 * - Delete order is revoke → delete. If delete fails after revoke, the user
 *   is logged out but still exists, which is the safe side.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';

import { LoginTakenError } from './dal/user.repo';
import type { NewUser, UserPatch, UserRepo } from './dal/user.repo';
import { assertAdmin } from './policies/admin-access.policy';
import { normalizePage } from './policies/pagination.policy';
import { UserErrors } from './user.errors';
import type { Actor, Gender, Role, User, UserId } from './user.types';

/** Narrow view of the refresh token store; users module does not depend on auth internals. */
export interface UserSessionRevoker {
  revokeAllForUser(userId: UserId): Promise<number>;
}

export type CreateUserInput = {
  lastName: string;
  firstName: string;
  middleName?: string | null;
  login: string;
  password: string;
  role: Role;
  gender: Gender;
  className?: string | null;
  graduationYear?: number | null;
};

export type UpdateUserInput = Partial<CreateUserInput>;

export type UserPage = {
  items: User[];
  total: number;
  offset: number;
  limit: number;
};

type OpContext = { actor: Actor; requestId?: string };

export class UserService {
  constructor(
    private readonly deps: {
      userRepo: UserRepo;
      passwordHasher: PasswordHasher;
      sessions: UserSessionRevoker;
      logger: Logger;
    },
  ) {}

  async list(ctx: OpContext, page: { offset?: number; limit?: number }): Promise<UserPage> {
    assertAdmin(ctx.actor);

    const { offset, limit } = normalizePage(page);
    const [items, total] = await Promise.all([
      this.deps.userRepo.list({ offset, limit }),
      this.deps.userRepo.count(),
    ]);

    return { items, total, offset, limit };
  }

  async get(ctx: OpContext, id: UserId): Promise<User> {
    assertAdmin(ctx.actor);

    const user = await this.deps.userRepo.findById(id);
    if (!user) throw UserErrors.notFound({ userId: id });
    return user;
  }

  async create(ctx: OpContext, input: CreateUserInput): Promise<User> {
    assertAdmin(ctx.actor);

    // Cheap pre-check so a duplicate does not pay for a hash; the unique index
    // still decides under concurrency.
    if (await this.deps.userRepo.findByLogin(input.login)) {
      throw UserErrors.loginTaken();
    }

    const newUser: NewUser = {
      lastName: input.lastName,
      firstName: input.firstName,
      middleName: input.middleName ?? null,
      login: input.login,
      passwordHash: await this.deps.passwordHasher.hash(input.password),
      role: input.role,
      gender: input.gender,
      className: input.className ?? null,
      graduationYear: input.graduationYear ?? null,
    };

    let user: User;
    try {
      user = await this.deps.userRepo.insert(newUser);
    } catch (err) {
      if (err instanceof LoginTakenError) throw UserErrors.loginTaken();
      throw err;
    }

    this.deps.logger.info('user.created', {
      flow: 'users.create',
      requestId: ctx.requestId,
      actorId: ctx.actor.userId,
      userId: user.id,
      role: user.role,
    });

    return user;
  }

  async update(ctx: OpContext, id: UserId, input: UpdateUserInput): Promise<User> {
    assertAdmin(ctx.actor);

    const existing = await this.deps.userRepo.findById(id);
    if (!existing) throw UserErrors.notFound({ userId: id });

    if (input.login !== undefined && input.login !== existing.login) {
      const holder = await this.deps.userRepo.findByLogin(input.login);
      if (holder) throw UserErrors.loginTaken();
    }

    const { password, ...fields } = input;
    const patch: UserPatch = { ...fields };
    if (password !== undefined) {
      patch.passwordHash = await this.deps.passwordHasher.hash(password);
    }

    let updated: User | undefined;
    try {
      updated = await this.deps.userRepo.update(id, patch);
    } catch (err) {
      if (err instanceof LoginTakenError) throw UserErrors.loginTaken();
      throw err;
    }
    if (!updated) throw UserErrors.notFound({ userId: id });

    let revokedTokens = 0;
    if (password !== undefined) {
      revokedTokens = await this.deps.sessions.revokeAllForUser(id);
    }

    this.deps.logger.info('user.updated', {
      flow: 'users.update',
      requestId: ctx.requestId,
      actorId: ctx.actor.userId,
      userId: id,
      fields: Object.entries(input)
        .filter(([, v]) => v !== undefined)
        .map(([k]) => k),
      revokedTokens,
    });

    return updated;
  }

  async delete(ctx: OpContext, id: UserId): Promise<void> {
    assertAdmin(ctx.actor);

    const existing = await this.deps.userRepo.findById(id);
    if (!existing) throw UserErrors.notFound({ userId: id });

    const revokedTokens = await this.deps.sessions.revokeAllForUser(id);

    const deleted = await this.deps.userRepo.delete(id);
    if (!deleted) throw UserErrors.notFound({ userId: id });

    this.deps.logger.info('user.deleted', {
      flow: 'users.delete',
      requestId: ctx.requestId,
      actorId: ctx.actor.userId,
      userId: id,
      revokedTokens,
    });
  }
}
