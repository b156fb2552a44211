/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, platform injects env vars (no file).
 *
 * TYPING:
 * - JWT signing material is a discriminated union on `algorithm`, so the codec
 *   can never be handed an RS256 config without a key pair.
 * - Cross-field rules (secret required for HS256, keys for RS256, no default
 *   admin password in production) fail at startup via superRefine.
 */

import 'dotenv/config';
import { z } from 'zod';

import { MIN_HS256_SECRET_LENGTH } from '../shared/security/access-token-codec';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() treats "false" as true.
const BoolFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const DEFAULT_ADMIN_PASSWORD = 'admin';

// JSON object of kid → verify-only key (HS256 secret or RS256 public PEM).
const RetiredKeysSchema = z
  .string()
  .default('{}')
  .transform((raw, ctx): unknown => {
    try {
      return JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_RETIRED_KEYS must be a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string().min(1), z.string().min(1)));

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    DATABASE_URL: z.string().min(1),
    DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('jwt-auth-backend'),

    // Password hashing (argon2id)
    ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(19456),
    ARGON2_TIME_COST: z.coerce.number().int().min(1).default(2),
    ARGON2_PARALLELISM: z.coerce.number().int().min(1).default(1),

    // Token signing
    JWT_ALGORITHM: z.enum(['HS256', 'RS256']).default('HS256'),
    JWT_SECRET: z.string().optional(),
    JWT_PRIVATE_KEY: z.string().optional(),
    JWT_PUBLIC_KEY: z.string().optional(),
    JWT_KEY_ID: z.string().min(1).default('primary'),
    JWT_ISSUER: z.string().min(1).default('jwt-auth'),
    JWT_RETIRED_KEYS: RetiredKeysSchema,

    ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).max(86400).default(1800),
    REFRESH_TOKEN_TTL_SECONDS: z.coerce
      .number()
      .int()
      .min(300)
      .max(60 * 60 * 24 * 90)
      .default(604800),

    // Admin bootstrap (idempotent)
    SEED_ON_START: BoolFlagSchema,
    SEED_ADMIN_LOGIN: z.string().min(1).default('admin'),
    SEED_ADMIN_PASSWORD: z.string().min(1).default(DEFAULT_ADMIN_PASSWORD),
  })
  .superRefine((env, ctx) => {
    if (env.JWT_ALGORITHM === 'HS256') {
      if (!env.JWT_SECRET || env.JWT_SECRET.length < MIN_HS256_SECRET_LENGTH) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['JWT_SECRET'],
          message: `JWT_SECRET must be at least ${MIN_HS256_SECRET_LENGTH} characters for HS256`,
        });
      }
    } else {
      if (!env.JWT_PRIVATE_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['JWT_PRIVATE_KEY'],
          message: 'JWT_PRIVATE_KEY is required for RS256',
        });
      }
      if (!env.JWT_PUBLIC_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['JWT_PUBLIC_KEY'],
          message: 'JWT_PUBLIC_KEY is required for RS256',
        });
      }
    }

    if (
      env.NODE_ENV === 'production' &&
      env.SEED_ON_START &&
      env.SEED_ADMIN_PASSWORD === DEFAULT_ADMIN_PASSWORD
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SEED_ADMIN_PASSWORD'],
        message: 'SEED_ADMIN_PASSWORD must be changed from the default in production',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type JwtSigningConfig =
  | { algorithm: 'HS256'; secret: string }
  | { algorithm: 'RS256'; privateKeyPem: string; publicKeyPem: string };

export type RetiredVerifyKey = { keyId: string; key: string };

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  dbStatementTimeoutMs: number;

  logLevel: string;
  serviceName: string;

  argon2: {
    memoryCost: number;
    timeCost: number;
    parallelism: number;
  };

  jwt: {
    signing: JwtSigningConfig;
    keyId: string;
    issuer: string;
    retiredKeys: RetiredVerifyKey[];
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
  };

  seed: {
    enabled: boolean;
    adminLogin: string;
    adminPassword: string;
  };
};

// PEMs passed through env often arrive with literal "\n" sequences.
function normalizePem(raw: string): string {
  return raw.replace(/\\n/g, '\n');
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  const signing: JwtSigningConfig =
    parsed.JWT_ALGORITHM === 'HS256'
      ? { algorithm: 'HS256', secret: parsed.JWT_SECRET ?? '' }
      : {
          algorithm: 'RS256',
          privateKeyPem: normalizePem(parsed.JWT_PRIVATE_KEY ?? ''),
          publicKeyPem: normalizePem(parsed.JWT_PUBLIC_KEY ?? ''),
        };

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    dbStatementTimeoutMs: parsed.DB_STATEMENT_TIMEOUT_MS,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    argon2: {
      memoryCost: parsed.ARGON2_MEMORY_COST,
      timeCost: parsed.ARGON2_TIME_COST,
      parallelism: parsed.ARGON2_PARALLELISM,
    },

    jwt: {
      signing,
      keyId: parsed.JWT_KEY_ID,
      issuer: parsed.JWT_ISSUER,
      retiredKeys: Object.entries(parsed.JWT_RETIRED_KEYS).map(([keyId, key]) => ({
        keyId,
        key: normalizePem(key),
      })),
      accessTokenTtlSeconds: parsed.ACCESS_TOKEN_TTL_SECONDS,
      refreshTokenTtlSeconds: parsed.REFRESH_TOKEN_TTL_SECONDS,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      adminLogin: parsed.SEED_ADMIN_LOGIN,
      adminPassword: parsed.SEED_ADMIN_PASSWORD,
    },
  };
}
