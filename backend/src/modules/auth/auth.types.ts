/**
 * backend/src/modules/auth/auth.types.ts
 *
 * Wire + domain shapes shared by the auth service, flows and controller.
 */

import type { Role } from '../users';
import type { Permission } from './policies/role-permissions.policy';

/** Response body for /auth/login and /auth/refresh. */
export type TokenPairResponse = {
  access_token: string;
  refresh_token: string;
  /** Access token lifetime in seconds. */
  expires_in: number;
  token_type: 'bearer';
};

/** Identity carried by a verified access token. */
export type Principal = Readonly<{
  userId: string;
  role: Role;
  permissions: readonly Permission[];
}>;

export type VerifyResponse = {
  user_id: string;
  role: Role;
  permissions: Permission[];
};
