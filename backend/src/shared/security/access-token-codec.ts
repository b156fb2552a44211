/**
 * backend/src/shared/security/access-token-codec.ts
 *
 * WHY:
 * - Access tokens are verified statelessly on every authenticated request.
 * - Services depend on this interface, not on jsonwebtoken directly.
 *
 * RULES:
 * - decode() distinguishes failure reasons for logs only. The HTTP boundary
 *   collapses every reason into the same 401.
 * - Never log the raw token.
 */

import type { JsonWebKey } from 'node:crypto';

import type { Role } from '../../modules/users/user.types';
import type { Permission } from '../../modules/auth/policies/role-permissions.policy';

/** HS256 keys shorter than this are refused at startup. */
export const MIN_HS256_SECRET_LENGTH = 32;

export type IssueAccessTokenParams = {
  subject: string;
  role: Role;
  permissions: readonly Permission[];
  ttlSeconds: number;
};

export type AccessTokenClaims = Readonly<{
  subject: string;
  role: Role;
  permissions: readonly Permission[];
  tokenId: string;
  issuedAt: Date;
  expiresAt: Date;
}>;

export type AccessTokenFailureReason = 'invalid_signature' | 'expired' | 'malformed';

export class AccessTokenError extends Error {
  constructor(public readonly reason: AccessTokenFailureReason) {
    super(`Access token rejected: ${reason}`);
    this.name = 'AccessTokenError';
  }
}

export type PublicJwk = JsonWebKey & {
  kid: string;
  alg: string;
  use: 'sig';
};

export type JwkSet = { keys: PublicJwk[] };

export interface AccessTokenCodec {
  issue(params: IssueAccessTokenParams): string;

  /** Throws AccessTokenError. */
  decode(token: string): AccessTokenClaims;

  /** Public verification keys. Empty for symmetric algorithms. */
  jwks(): JwkSet;
}
