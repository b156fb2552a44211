/**
 * backend/src/app/persistence.ts
 *
 * WHY:
 * - The user directory and the refresh token store come as a pair: both
 *   Postgres (runtime) or both in-memory (tests, local runs without a DB).
 * - The composition root picks one; modules only see the interfaces.
 *
 * RULES:
 * - ping() must fail when storage is unreachable. di.ts calls it at startup
 *   so the process refuses to start.
 */

import type { AppConfig } from './config';
import type { Clock } from '../shared/clock';
import { createDb, pingDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';
import type { TokenHasher } from '../shared/security/token-hasher';
import type { UserRepo } from '../modules/users';
import { PgUserRepo } from '../modules/users/dal/pg-user.repo';
import { InMemUserRepo } from '../modules/users/dal/inmem-user.repo';
import type { RefreshTokenStore } from '../modules/auth';
import { InMemRefreshTokenStore, PgRefreshTokenStore } from '../modules/auth';

export type Persistence = {
  kind: 'postgres' | 'memory';
  userRepo: UserRepo;
  refreshTokens: RefreshTokenStore;
  /** Kysely handle when backed by Postgres. */
  db: Db | null;
  ping(): Promise<void>;
  close(): Promise<void>;
};

export function createPgPersistence(
  config: Pick<AppConfig, 'databaseUrl' | 'dbStatementTimeoutMs'>,
  deps: { tokenHasher: TokenHasher; clock: Clock },
): Persistence {
  const db = createDb({
    databaseUrl: config.databaseUrl,
    statementTimeoutMs: config.dbStatementTimeoutMs,
  });

  return {
    kind: 'postgres',
    userRepo: new PgUserRepo(db),
    refreshTokens: new PgRefreshTokenStore(db, deps.tokenHasher, deps.clock),
    db,
    ping: () => pingDb(db),
    close: () => db.destroy(),
  };
}

export function createInMemPersistence(deps: {
  tokenHasher: TokenHasher;
  clock: Clock;
}): Persistence & { userRepo: InMemUserRepo; refreshTokens: InMemRefreshTokenStore } {
  return {
    kind: 'memory',
    userRepo: new InMemUserRepo(deps.clock),
    refreshTokens: new InMemRefreshTokenStore(deps.tokenHasher, deps.clock),
    db: null,
    ping: () => Promise.resolve(),
    close: () => Promise.resolve(),
  };
}
