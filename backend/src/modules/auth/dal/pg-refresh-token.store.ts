/**
 * backend/src/modules/auth/dal/pg-refresh-token.store.ts
 *
 * WHY:
 * - Kysely/Postgres implementation of RefreshTokenStore.
 *
 * ATOMICITY:
 * - Rotation is a conditional UPDATE (revoked = false AND expires_at > now)
 *   followed by the INSERT of the replacement, inside one transaction.
 * - Two concurrent rotations of the same token serialize on the row lock; the
 *   loser re-evaluates the WHERE clause after the winner commits, updates zero
 *   rows, and is classified by re-reading the row.
 * - No in-process locks.
 *
 * RULES:
 * - No AppError.
 * - "now" comes from the injected clock so tests and the in-memory store agree.
 */

import { randomUUID } from 'node:crypto';

import type { DbExecutor } from '../../../shared/db/db';
import type { Clock } from '../../../shared/clock';
import { systemClock } from '../../../shared/clock';
import type { TokenHasher } from '../../../shared/security/token-hasher';
import { generateSecureToken, REFRESH_TOKEN_BYTES } from '../../../shared/security/token';
import { classifyRefreshToken } from '../policies/refresh-token-state.policy';
import { selectRefreshTokenByHashSql } from './refresh-token.query-sql';
import type {
  CreateRefreshTokenParams,
  IssuedRefreshToken,
  RefreshTokenStore,
  RevokeOutcome,
  RotateFailureReason,
  RotateResult,
} from './refresh-token.store';

export class PgRefreshTokenStore implements RefreshTokenStore {
  constructor(
    private readonly db: DbExecutor,
    private readonly tokenHasher: TokenHasher,
    private readonly clock: Clock = systemClock,
  ) {}

  private async insertToken(
    db: DbExecutor,
    params: { userId: string; familyId: string; ttlSeconds: number; now: Date },
  ): Promise<IssuedRefreshToken> {
    const token = generateSecureToken(REFRESH_TOKEN_BYTES);
    const expiresAt = new Date(params.now.getTime() + params.ttlSeconds * 1000);

    const row = await db
      .insertInto('refresh_tokens')
      .values({
        user_id: params.userId,
        family_id: params.familyId,
        token_hash: this.tokenHasher.hash(token),
        expires_at: expiresAt,
        created_at: params.now,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();

    return {
      token,
      id: row.id,
      userId: params.userId,
      familyId: params.familyId,
      expiresAt,
    };
  }

  async create(params: CreateRefreshTokenParams): Promise<IssuedRefreshToken> {
    return this.insertToken(this.db, {
      userId: params.userId,
      familyId: params.familyId ?? randomUUID(),
      ttlSeconds: params.ttlSeconds,
      now: this.clock(),
    });
  }

  async validateAndRotate(params: { token: string; ttlSeconds: number }): Promise<RotateResult> {
    const tokenHash = this.tokenHasher.hash(params.token);
    const now = this.clock();

    return this.db.transaction().execute(async (trx): Promise<RotateResult> => {
      const consumed = await trx
        .updateTable('refresh_tokens')
        .set({ revoked: true, revoked_at: now })
        .where('token_hash', '=', tokenHash)
        .where('revoked', '=', false)
        .where('expires_at', '>', now)
        .returning(['id', 'user_id', 'family_id'])
        .executeTakeFirst();

      if (!consumed) {
        const row = await selectRefreshTokenByHashSql(trx, tokenHash);
        const state = classifyRefreshToken(
          row ? { revoked: row.revoked, expiresAt: row.expires_at } : undefined,
          now,
        );
        // "active" here means another transaction changed the row between our
        // UPDATE and SELECT; for this caller the token is spent.
        const reason: RotateFailureReason = state === 'active' ? 'revoked' : state;
        return { ok: false, reason };
      }

      const issued = await this.insertToken(trx, {
        userId: consumed.user_id,
        familyId: consumed.family_id,
        ttlSeconds: params.ttlSeconds,
        now,
      });

      await trx
        .updateTable('refresh_tokens')
        .set({ replaced_by_id: issued.id })
        .where('id', '=', consumed.id)
        .execute();

      return { ok: true, userId: consumed.user_id, previousId: consumed.id, issued };
    });
  }

  async revoke(token: string): Promise<RevokeOutcome> {
    const tokenHash = this.tokenHasher.hash(token);

    const updated = await this.db
      .updateTable('refresh_tokens')
      .set({ revoked: true, revoked_at: this.clock() })
      .where('token_hash', '=', tokenHash)
      .where('revoked', '=', false)
      .returning(['id'])
      .executeTakeFirst();

    if (updated) return 'revoked';

    const existing = await selectRefreshTokenByHashSql(this.db, tokenHash);
    return existing ? 'already_revoked' : 'not_found';
  }

  async revokeAllForUser(userId: string): Promise<number> {
    const result = await this.db
      .updateTable('refresh_tokens')
      .set({ revoked: true, revoked_at: this.clock() })
      .where('user_id', '=', userId)
      .where('revoked', '=', false)
      .executeTakeFirst();

    return Number(result.numUpdatedRows);
  }
}
