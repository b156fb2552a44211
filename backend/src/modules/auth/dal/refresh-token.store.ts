/**
 * backend/src/modules/auth/dal/refresh-token.store.ts
 *
 * WHY:
 * - Refresh tokens are opaque, single-use, and tracked server-side so they can
 *   be revoked. Only a SHA-256 hash of the raw token is ever stored.
 * - Two implementations: PgRefreshTokenStore (runtime) and
 *   InMemRefreshTokenStore (tests, local runs).
 *
 * CONTRACT:
 * - validateAndRotate() is atomic: for N concurrent calls with the same valid
 *   token, exactly one returns ok. The others see `revoked`.
 * - Every token created by rotation shares the family id of the login that
 *   started the lineage.
 * - revoke() is idempotent.
 *
 * RULES:
 * - No AppError. Failure reasons are data; the Session Manager collapses them.
 */

import type { UserId } from '../../users';

export type RefreshTokenRecord = {
  id: string;
  userId: UserId;
  familyId: string;
  tokenHash: string;
  expiresAt: Date;
  revoked: boolean;
  revokedAt: Date | null;
  replacedById: string | null;
  createdAt: Date;
};

/** The raw token is only available here, at creation time. */
export type IssuedRefreshToken = {
  token: string;
  id: string;
  userId: UserId;
  familyId: string;
  expiresAt: Date;
};

export type RotateFailureReason = 'not_found' | 'revoked' | 'expired';

export type RotateResult =
  | { ok: true; userId: UserId; previousId: string; issued: IssuedRefreshToken }
  | { ok: false; reason: RotateFailureReason };

export type RevokeOutcome = 'revoked' | 'already_revoked' | 'not_found';

export type CreateRefreshTokenParams = {
  userId: UserId;
  ttlSeconds: number;
  /** Omitted on login (new lineage). */
  familyId?: string;
};

export interface RefreshTokenStore {
  create(params: CreateRefreshTokenParams): Promise<IssuedRefreshToken>;

  validateAndRotate(params: { token: string; ttlSeconds: number }): Promise<RotateResult>;

  revoke(token: string): Promise<RevokeOutcome>;

  /** Returns the number of records that were active and are now revoked. */
  revokeAllForUser(userId: UserId): Promise<number>;
}
