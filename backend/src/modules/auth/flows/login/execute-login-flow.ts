/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin while isolating orchestration:
 *   verify credentials → start a refresh lineage → sign access token.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - No raw SQL here (use repos/stores).
 * - Never log the login itself; log its SHA-256 key.
 * - Unknown login and wrong password end in the same AuthErrors.invalidCredentials().
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { AccessTokenCodec } from '../../../../shared/security/access-token-codec';

import type { CredentialVerifier } from '../../credential-verifier';
import type { RefreshTokenStore } from '../../dal/refresh-token.store';
import { AuthErrors } from '../../auth.errors';
import type { TokenPairResponse } from '../../auth.types';
import { buildTokenResponse } from '../../helpers/build-token-response';

export type LoginParams = {
  login: string;
  password: string;
  requestId?: string;
};

export async function executeLoginFlow(
  deps: {
    credentialVerifier: CredentialVerifier;
    refreshTokens: RefreshTokenStore;
    codec: AccessTokenCodec;
    tokenHasher: TokenHasher;
    logger: Logger;
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
  },
  params: LoginParams,
): Promise<TokenPairResponse> {
  const loginKey = deps.tokenHasher.hash(params.login);

  deps.logger.info('auth.login.start', {
    flow: 'auth.login',
    requestId: params.requestId,
    loginKey,
  });

  const result = await deps.credentialVerifier.verify(params.login, params.password);
  if (!result.ok) {
    deps.logger.warn('auth.login.failed', {
      flow: 'auth.login',
      requestId: params.requestId,
      loginKey,
      reason: result.reason,
    });
    throw AuthErrors.invalidCredentials();
  }

  const { user } = result;

  const refresh = await deps.refreshTokens.create({
    userId: user.id,
    ttlSeconds: deps.refreshTokenTtlSeconds,
  });

  const response = buildTokenResponse({
    codec: deps.codec,
    user,
    refreshToken: refresh.token,
    accessTokenTtlSeconds: deps.accessTokenTtlSeconds,
  });

  deps.logger.info('auth.login.success', {
    flow: 'auth.login',
    requestId: params.requestId,
    userId: user.id,
    role: user.role,
    familyId: refresh.familyId,
  });

  return response;
}
