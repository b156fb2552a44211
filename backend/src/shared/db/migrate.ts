/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably outside the app process.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import { createDb } from './db';
import { migrateToLatest } from './migrator';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb({
    databaseUrl: config.databaseUrl,
    statementTimeoutMs: config.dbStatementTimeoutMs,
  });

  try {
    const { error, results } = await migrateToLatest(db);

    results?.forEach((r) => {
      if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
      if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
    });

    if (error) {
      logger.error('migration.failed', { err: error });
      process.exitCode = 1;
      return;
    }

    logger.info('migration.up_to_date');
  } finally {
    await db.destroy();
  }
}

void runMigrations().catch((err: unknown) => {
  logger.error('migration.fatal', { err });
  process.exit(1);
});
