/**
 * backend/src/modules/auth/flows/refresh/execute-refresh-flow.ts
 *
 * WHY:
 * - Refresh = atomic single-use rotation + re-reading the user, so the new
 *   access token carries the user's CURRENT role.
 *
 * RULES:
 * - Every failure (unknown, revoked, expired, user deleted) ends in the same
 *   AuthErrors.invalidRefreshToken(). The specific reason is logged.
 * - If the user vanished between rotation and re-read, the freshly issued
 *   token is revoked before failing, so nothing usable leaks.
 * - No reuse detection: presenting a rotated token fails but does not revoke
 *   the rest of its lineage.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { AccessTokenCodec } from '../../../../shared/security/access-token-codec';
import type { UserRepo } from '../../../users';

import type { RefreshTokenStore } from '../../dal/refresh-token.store';
import { AuthErrors } from '../../auth.errors';
import type { TokenPairResponse } from '../../auth.types';
import { buildTokenResponse } from '../../helpers/build-token-response';

export type RefreshParams = {
  refreshToken: string;
  requestId?: string;
};

export async function executeRefreshFlow(
  deps: {
    refreshTokens: RefreshTokenStore;
    userRepo: UserRepo;
    codec: AccessTokenCodec;
    logger: Logger;
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
  },
  params: RefreshParams,
): Promise<TokenPairResponse> {
  const rotated = await deps.refreshTokens.validateAndRotate({
    token: params.refreshToken,
    ttlSeconds: deps.refreshTokenTtlSeconds,
  });

  if (!rotated.ok) {
    deps.logger.warn('auth.refresh.rejected', {
      flow: 'auth.refresh',
      requestId: params.requestId,
      reason: rotated.reason,
    });
    throw AuthErrors.invalidRefreshToken();
  }

  const user = await deps.userRepo.findById(rotated.userId);
  if (!user) {
    await deps.refreshTokens.revoke(rotated.issued.token);

    deps.logger.warn('auth.refresh.rejected', {
      flow: 'auth.refresh',
      requestId: params.requestId,
      reason: 'user_not_found',
      userId: rotated.userId,
    });
    throw AuthErrors.invalidRefreshToken();
  }

  const response = buildTokenResponse({
    codec: deps.codec,
    user,
    refreshToken: rotated.issued.token,
    accessTokenTtlSeconds: deps.accessTokenTtlSeconds,
  });

  deps.logger.info('auth.refresh.success', {
    flow: 'auth.refresh',
    requestId: params.requestId,
    userId: user.id,
    role: user.role,
    familyId: rotated.issued.familyId,
  });

  return response;
}
