import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { createInMemPersistence } from '../../src/app/persistence';
import type { Clock } from '../../src/shared/clock';
import { systemClock } from '../../src/shared/clock';
import { Sha256TokenHasher } from '../../src/shared/security/sha256-token-hasher';
import type { NewUser } from '../../src/modules/users';
import type { User } from '../../src/modules/users';

export const TEST_JWT_SECRET = 'test-secret-test-secret-test-secret-0001';

/** Cheap argon2 parameters so tests stay fast. */
export const TEST_ARGON2 = { memoryCost: 4096, timeCost: 2, parallelism: 1 } as const;

export function buildTestConfig(
  overrides: { jwt?: Partial<AppConfig['jwt']>; seed?: Partial<AppConfig['seed']> } = {},
): AppConfig {
  const base: AppConfig = {
    nodeEnv: 'test',
    port: 0,
    databaseUrl: 'postgres://unused-in-memory',
    dbStatementTimeoutMs: 5000,

    logLevel: 'error',
    serviceName: 'jwt-auth-backend',

    argon2: { ...TEST_ARGON2 },

    jwt: {
      signing: { algorithm: 'HS256', secret: TEST_JWT_SECRET },
      keyId: 'primary',
      issuer: 'jwt-auth',
      retiredKeys: [],
      accessTokenTtlSeconds: 1800,
      refreshTokenTtlSeconds: 604800,
    },

    seed: {
      enabled: false, // IMPORTANT: OFF in tests by default
      adminLogin: 'admin',
      adminPassword: 'admin',
    },
  };

  return {
    ...base,
    jwt: { ...base.jwt, ...(overrides.jwt ?? {}) },
    seed: { ...base.seed, ...(overrides.seed ?? {}) },
  };
}

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Runs against in-memory persistence: no Postgres, no network.
 *
 * RULES:
 * - Seed is OFF by default.
 * - Pass a test clock to move time for expiry checks.
 */
export async function buildTestApp(
  opts: {
    jwt?: Partial<AppConfig['jwt']>;
    seed?: Partial<AppConfig['seed']>;
    clock?: Clock;
  } = {},
) {
  const config = buildTestConfig({ jwt: opts.jwt, seed: opts.seed });
  const clock = opts.clock ?? systemClock;
  const persistence = createInMemPersistence({ tokenHasher: new Sha256TokenHasher(), clock });

  const built = await buildApp(config, { persistence, clock });

  async function createUser(
    input: Partial<Omit<NewUser, 'passwordHash'>> & { login: string; password: string },
  ): Promise<User> {
    return persistence.userRepo.insert({
      lastName: input.lastName ?? 'Tester',
      firstName: input.firstName ?? 'Terry',
      middleName: input.middleName ?? null,
      login: input.login,
      passwordHash: await built.deps.passwordHasher.hash(input.password),
      role: input.role ?? 'student',
      gender: input.gender ?? 'female',
      className: input.className ?? null,
      graduationYear: input.graduationYear ?? null,
    });
  }

  async function login(loginName: string, password: string): Promise<TokenPairBody> {
    const res = await built.app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { login: loginName, password },
    });
    if (res.statusCode !== 200) {
      throw new Error(`login failed in test setup: ${res.statusCode} ${res.body}`);
    }
    return res.json<TokenPairBody>();
  }

  return {
    app: built.app,
    deps: built.deps,
    config,
    persistence,
    createUser,
    login,
    close: built.close,
  };
}

export type TokenPairBody = {
  access_token: string;
  refresh_token: string;
  expires_in: number;
  token_type: string;
};

export type ErrorBody = {
  error: { code: string; message: string };
};

export function bearer(token: string): { authorization: string } {
  return { authorization: `Bearer ${token}` };
}
