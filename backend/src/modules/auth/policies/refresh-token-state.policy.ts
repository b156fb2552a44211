/**
 * backend/src/modules/auth/policies/refresh-token-state.policy.ts
 *
 * WHY:
 * - Both store implementations must classify a presented refresh token the
 *   same way. Pure + unit-testable (no DB, no HTTP).
 *
 * RULES:
 * - Missing record → not_found.
 * - Revoked wins over expired (a rotated token stays "revoked" after its
 *   original expiry passes).
 * - expiresAt <= now → expired.
 */

export type RefreshTokenState = 'active' | 'not_found' | 'revoked' | 'expired';

export type RefreshTokenStateInput = Readonly<{
  revoked: boolean;
  expiresAt: Date;
}>;

export function classifyRefreshToken(
  record: RefreshTokenStateInput | undefined,
  now: Date,
): RefreshTokenState {
  if (!record) return 'not_found';
  if (record.revoked) return 'revoked';
  if (record.expiresAt.getTime() <= now.getTime()) return 'expired';
  return 'active';
}
