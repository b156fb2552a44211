/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - The auth module consumes `userRepo` (credential lookup, /auth/me).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { UserRepo } from './dal/user.repo';
import { UserService } from './user.service';
import type { UserSessionRevoker } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  sessions: UserSessionRevoker;
  logger: Logger;
}) {
  const userService = new UserService(deps);
  const controller = new UserController(userService);

  return {
    userRepo: deps.userRepo,
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
