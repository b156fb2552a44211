/**
 * backend/src/modules/auth/dal/refresh-token.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for refresh_tokens.
 *
 * RULES:
 * - No AppError.
 * - Lookups are by token hash, never by raw token.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { RefreshTokensTable } from '../../../shared/db/db.types';

export type RefreshTokenRow = Selectable<RefreshTokensTable>;

export async function selectRefreshTokenByHashSql(
  db: DbExecutor,
  tokenHash: string,
): Promise<RefreshTokenRow | undefined> {
  return db
    .selectFrom('refresh_tokens')
    .selectAll()
    .where('token_hash', '=', tokenHash)
    .executeTakeFirst();
}

export async function selectRefreshTokensByFamilySql(
  db: DbExecutor,
  familyId: string,
): Promise<RefreshTokenRow[]> {
  return db
    .selectFrom('refresh_tokens')
    .selectAll()
    .where('family_id', '=', familyId)
    .orderBy('created_at', 'asc')
    .execute();
}
