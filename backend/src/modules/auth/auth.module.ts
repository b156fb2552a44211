/**
 * backend/src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra (codec, stores, hashers); module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 * - registerHooks() installs the bearer hook. Call it before registerRoutes()
 *   of any module whose routes read req.authContext.
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../../shared/logger/logger';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AccessTokenCodec } from '../../shared/security/access-token-codec';
import type { UserRepo } from '../users';

import type { RefreshTokenStore } from './dal/refresh-token.store';
import { CredentialVerifier } from './credential-verifier';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { registerBearerAuth } from './auth.middleware';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  userRepo: UserRepo;
  refreshTokens: RefreshTokenStore;
  codec: AccessTokenCodec;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  logger: Logger;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}) {
  const credentialVerifier = new CredentialVerifier({
    userRepo: deps.userRepo,
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
  });

  const authService = new AuthService({
    userRepo: deps.userRepo,
    credentialVerifier,
    refreshTokens: deps.refreshTokens,
    codec: deps.codec,
    tokenHasher: deps.tokenHasher,
    logger: deps.logger,
    accessTokenTtlSeconds: deps.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: deps.refreshTokenTtlSeconds,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    credentialVerifier,
    registerHooks(app: FastifyInstance) {
      registerBearerAuth(app, authService);
    },
    registerRoutes(app: FastifyInstance) {
      return registerAuthRoutes(app, controller);
    },
  };
}
