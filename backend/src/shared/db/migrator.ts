/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One place that knows where migrations live, shared by the CLI script
 *   (migrate.ts) and DAL tests.
 * - We point directly to the SOURCE migrations folder and run under `tsx`,
 *   so dynamic imports of `.ts` migrations work without a build step.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { FileMigrationProvider, Migrator } from 'kysely';
import type { MigrationResultSet } from 'kysely';

import type { DbExecutor } from './db';

const migrationFolder = fileURLToPath(new URL('./migrations', import.meta.url));

export function createMigrator(db: DbExecutor): Migrator {
  return new Migrator({
    db,
    provider: new FileMigrationProvider({ fs, path, migrationFolder }),
  });
}

export async function migrateToLatest(db: DbExecutor): Promise<MigrationResultSet> {
  return createMigrator(db).migrateToLatest();
}
