/**
 * backend/src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Session Manager: orchestrates login, refresh, logout and access-token
 *   verification. Login and refresh are delegated to flows.
 *
 * RULES:
 * - verify()/tryVerify() are pure decodes: no storage access.
 * - logout() never fails from the caller's perspective, whatever state the
 *   token was in.
 * - Never store/log raw passwords or tokens.
 * - Internal failure reasons are logged; the HTTP boundary sees uniform 401s.
 */

import type { Logger } from '../../shared/logger/logger';
import type { TokenHasher } from '../../shared/security/token-hasher';
import {
  AccessTokenError,
  type AccessTokenCodec,
  type AccessTokenFailureReason,
  type JwkSet,
} from '../../shared/security/access-token-codec';
import type { User, UserRepo } from '../users';

import type { CredentialVerifier } from './credential-verifier';
import type { RefreshTokenStore } from './dal/refresh-token.store';
import { AuthErrors } from './auth.errors';
import type { Principal, TokenPairResponse } from './auth.types';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeRefreshFlow, type RefreshParams } from './flows/refresh/execute-refresh-flow';

export type LogoutParams = {
  refreshToken: string;
  requestId?: string;
  /** From an optional bearer token; logs only. */
  userId?: string | null;
};

export type VerifyResult =
  | { ok: true; principal: Principal }
  | { ok: false; reason: AccessTokenFailureReason };

export class AuthService {
  constructor(
    private readonly deps: {
      userRepo: UserRepo;
      credentialVerifier: CredentialVerifier;
      refreshTokens: RefreshTokenStore;
      codec: AccessTokenCodec;
      tokenHasher: TokenHasher;
      logger: Logger;
      accessTokenTtlSeconds: number;
      refreshTokenTtlSeconds: number;
    },
  ) {}

  async login(params: LoginParams): Promise<TokenPairResponse> {
    return executeLoginFlow(this.deps, params);
  }

  async refresh(params: RefreshParams): Promise<TokenPairResponse> {
    return executeRefreshFlow(this.deps, params);
  }

  async logout(params: LogoutParams): Promise<void> {
    const outcome = await this.deps.refreshTokens.revoke(params.refreshToken);

    this.deps.logger.info('auth.logout', {
      flow: 'auth.logout',
      requestId: params.requestId,
      userId: params.userId ?? null,
      outcome,
    });
  }

  tryVerify(accessToken: string): VerifyResult {
    try {
      const claims = this.deps.codec.decode(accessToken);
      return {
        ok: true,
        principal: {
          userId: claims.subject,
          role: claims.role,
          permissions: claims.permissions,
        },
      };
    } catch (err) {
      if (err instanceof AccessTokenError) return { ok: false, reason: err.reason };
      throw err;
    }
  }

  verify(accessToken: string): Principal {
    const result = this.tryVerify(accessToken);
    if (!result.ok) throw AuthErrors.invalidAccessToken({ reason: result.reason });
    return result.principal;
  }

  /** Current user record for a verified principal. 401 if the user was deleted. */
  async getCurrentUser(principal: Principal): Promise<User> {
    const user = await this.deps.userRepo.findById(principal.userId);
    if (!user) throw AuthErrors.invalidAccessToken({ reason: 'user_not_found' });
    return user;
  }

  jwks(): JwkSet {
    return this.deps.codec.jwks();
  }
}
