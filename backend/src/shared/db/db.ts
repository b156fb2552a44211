/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Statement + connect timeouts are set here so a stuck database surfaces as a
 *   retryable error (503) instead of hanging requests.
 *
 * HOW TO USE:
 * - const db = createDb({ databaseUrl, statementTimeoutMs })
 * - Pass `db` (or a `trx`) into repos/queries as DbExecutor.
 */

import pg from 'pg';
import { Kysely, PostgresDialect, sql } from 'kysely';

import type { DB } from './db.types';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(opts: { databaseUrl: string; statementTimeoutMs: number }): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: opts.statementTimeoutMs,
    statement_timeout: opts.statementTimeoutMs,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}

/** Round-trips a trivial query. Used at startup so an unreachable DB is fatal. */
export async function pingDb(db: DbExecutor): Promise<void> {
  await sql`select 1`.execute(db);
}
