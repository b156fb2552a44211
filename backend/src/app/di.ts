/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, signing keys, hashers) and shares them.
 * - Keeps modules testable: tests inject in-memory persistence and a clock.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Fatal misconfiguration surfaces here, before the server listens:
 *   bad signing key (codec constructor) and unreachable DB (ping).
 */

import type { AppConfig } from './config';
import { createPgPersistence } from './persistence';
import type { Persistence } from './persistence';

import type { Clock } from '../shared/clock';
import { systemClock } from '../shared/clock';

import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { Argon2PasswordHasher } from '../shared/security/argon2-password-hasher';

import type { AccessTokenCodec } from '../shared/security/access-token-codec';
import { JwtAccessTokenCodec } from '../shared/security/jwt-access-token-codec';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth';
import type { AuthModule } from '../modules/auth';

export type AppDeps = {
  persistence: Persistence;
  clock: Clock;

  logger: Logger;

  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  codec: AccessTokenCodec;

  // modules
  users: UserModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  persistence?: Persistence;
  clock?: Clock;
};

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const clock = overrides.clock ?? systemClock;

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new Argon2PasswordHasher(config.argon2);

  // Throws on a short secret or unparsable PEM.
  const codec: AccessTokenCodec = new JwtAccessTokenCodec({
    signing: config.jwt.signing,
    keyId: config.jwt.keyId,
    issuer: config.jwt.issuer,
    retiredKeys: config.jwt.retiredKeys,
    clock,
  });

  const persistence = overrides.persistence ?? createPgPersistence(config, { tokenHasher, clock });

  try {
    await persistence.ping();
  } catch (err) {
    await persistence.close();
    throw new Error('Storage is unreachable at startup', { cause: err });
  }

  logger.info('deps.ready', {
    flow: 'app.start',
    persistence: persistence.kind,
    jwtAlgorithm: config.jwt.signing.algorithm,
    jwtKeyId: config.jwt.keyId,
    jwtRetiredKeyIds: config.jwt.retiredKeys.map((k) => k.keyId),
  });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({
    userRepo: persistence.userRepo,
    passwordHasher,
    sessions: persistence.refreshTokens,
    logger,
  });

  const auth = createAuthModule({
    userRepo: persistence.userRepo,
    refreshTokens: persistence.refreshTokens,
    codec,
    passwordHasher,
    tokenHasher,
    logger,
    accessTokenTtlSeconds: config.jwt.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: config.jwt.refreshTokenTtlSeconds,
  });

  return {
    persistence,
    clock,
    logger,
    tokenHasher,
    passwordHasher,
    codec,
    users,
    auth,
    close: () => persistence.close(),
  };
}
