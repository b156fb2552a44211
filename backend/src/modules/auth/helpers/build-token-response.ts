/**
 * backend/src/modules/auth/helpers/build-token-response.ts
 *
 * WHY:
 * - Login and refresh both end by signing an access token for a user and
 *   pairing it with a freshly issued refresh token. One place, one shape.
 *
 * RULES:
 * - Permissions are resolved from the user's CURRENT role at issue time.
 */

import type { AccessTokenCodec } from '../../../shared/security/access-token-codec';
import type { User } from '../../users';
import { permissionsForRole } from '../policies/role-permissions.policy';
import type { TokenPairResponse } from '../auth.types';

export function buildTokenResponse(params: {
  codec: AccessTokenCodec;
  user: Pick<User, 'id' | 'role'>;
  refreshToken: string;
  accessTokenTtlSeconds: number;
}): TokenPairResponse {
  const accessToken = params.codec.issue({
    subject: params.user.id,
    role: params.user.role,
    permissions: permissionsForRole(params.user.role),
    ttlSeconds: params.accessTokenTtlSeconds,
  });

  return {
    access_token: accessToken,
    refresh_token: params.refreshToken,
    expires_in: params.accessTokenTtlSeconds,
    token_type: 'bearer',
  };
}
