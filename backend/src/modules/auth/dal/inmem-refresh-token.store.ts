/**
 * backend/src/modules/auth/dal/inmem-refresh-token.store.ts
 *
 * WHY:
 * - Allows tests (and local runs without Postgres) to exercise rotation,
 *   revocation and lineage semantics.
 *
 * ATOMICITY:
 * - validateAndRotate() checks and flips `revoked` synchronously, before its
 *   first await point, so two concurrent callers can never both see an
 *   active record.
 *
 * HOW TO USE:
 * - new InMemRefreshTokenStore(new Sha256TokenHasher(), clock)
 */

import { randomUUID } from 'node:crypto';

import type { Clock } from '../../../shared/clock';
import { systemClock } from '../../../shared/clock';
import type { TokenHasher } from '../../../shared/security/token-hasher';
import { generateSecureToken, REFRESH_TOKEN_BYTES } from '../../../shared/security/token';
import { classifyRefreshToken } from '../policies/refresh-token-state.policy';
import type {
  CreateRefreshTokenParams,
  IssuedRefreshToken,
  RefreshTokenRecord,
  RefreshTokenStore,
  RevokeOutcome,
  RotateResult,
} from './refresh-token.store';

export class InMemRefreshTokenStore implements RefreshTokenStore {
  private readonly byHash = new Map<string, RefreshTokenRecord>();

  constructor(
    private readonly tokenHasher: TokenHasher,
    private readonly clock: Clock = systemClock,
  ) {}

  private insert(params: {
    userId: string;
    familyId: string;
    ttlSeconds: number;
    now: Date;
  }): IssuedRefreshToken {
    const token = generateSecureToken(REFRESH_TOKEN_BYTES);
    const record: RefreshTokenRecord = {
      id: randomUUID(),
      userId: params.userId,
      familyId: params.familyId,
      tokenHash: this.tokenHasher.hash(token),
      expiresAt: new Date(params.now.getTime() + params.ttlSeconds * 1000),
      revoked: false,
      revokedAt: null,
      replacedById: null,
      createdAt: params.now,
    };

    this.byHash.set(record.tokenHash, record);

    return {
      token,
      id: record.id,
      userId: record.userId,
      familyId: record.familyId,
      expiresAt: record.expiresAt,
    };
  }

  create(params: CreateRefreshTokenParams): Promise<IssuedRefreshToken> {
    return Promise.resolve(
      this.insert({
        userId: params.userId,
        familyId: params.familyId ?? randomUUID(),
        ttlSeconds: params.ttlSeconds,
        now: this.clock(),
      }),
    );
  }

  validateAndRotate(params: { token: string; ttlSeconds: number }): Promise<RotateResult> {
    const now = this.clock();
    const record = this.byHash.get(this.tokenHasher.hash(params.token));

    const state = classifyRefreshToken(record, now);
    if (!record || state !== 'active') {
      return Promise.resolve({ ok: false, reason: state === 'active' ? 'not_found' : state });
    }

    record.revoked = true;
    record.revokedAt = now;

    const issued = this.insert({
      userId: record.userId,
      familyId: record.familyId,
      ttlSeconds: params.ttlSeconds,
      now,
    });
    record.replacedById = issued.id;

    return Promise.resolve({ ok: true, userId: record.userId, previousId: record.id, issued });
  }

  revoke(token: string): Promise<RevokeOutcome> {
    const record = this.byHash.get(this.tokenHasher.hash(token));
    if (!record) return Promise.resolve('not_found');
    if (record.revoked) return Promise.resolve('already_revoked');

    record.revoked = true;
    record.revokedAt = this.clock();
    return Promise.resolve('revoked');
  }

  revokeAllForUser(userId: string): Promise<number> {
    const now = this.clock();
    let count = 0;

    for (const record of this.byHash.values()) {
      if (record.userId === userId && !record.revoked) {
        record.revoked = true;
        record.revokedAt = now;
        count += 1;
      }
    }

    return Promise.resolve(count);
  }

  /** Test/diagnostic view of one lineage, oldest first. Copies. */
  listFamily(familyId: string): RefreshTokenRecord[] {
    return [...this.byHash.values()]
      .filter((r) => r.familyId === familyId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((r) => ({ ...r }));
  }
}
