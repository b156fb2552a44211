/**
 * backend/src/shared/db/seed/seed-admin.ts
 *
 * CLI wrapper around runAdminSeed() for on-demand bootstrap.
 *
 * HOW TO USE:
 * - npm run db:seed-admin --workspace backend
 */

import 'dotenv/config';

import { buildConfig } from '../../../app/config';
import { createDb } from '../db';
import { PgUserRepo } from '../../../modules/users/dal/pg-user.repo';
import { Argon2PasswordHasher } from '../../security/argon2-password-hasher';
import { logger } from '../../logger/logger';
import { runAdminSeed } from './admin-seed';

async function main(): Promise<void> {
  const config = buildConfig();
  const db = createDb({
    databaseUrl: config.databaseUrl,
    statementTimeoutMs: config.dbStatementTimeoutMs,
  });

  try {
    await runAdminSeed({
      userRepo: new PgUserRepo(db),
      passwordHasher: new Argon2PasswordHasher(config.argon2),
      logger,
      options: { login: config.seed.adminLogin, password: config.seed.adminPassword },
    });
  } finally {
    await db.destroy();
  }
}

void main().catch((err: unknown) => {
  logger.error('seed.admin.failed', { err });
  process.exit(1);
});
