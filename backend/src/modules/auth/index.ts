/**
 * backend/src/modules/auth/index.ts
 *
 * Public surface of the auth module.
 */

export { createAuthModule } from './auth.module';
export type { AuthModule } from './auth.module';
export type { RefreshTokenStore } from './dal/refresh-token.store';
export { PgRefreshTokenStore } from './dal/pg-refresh-token.store';
export { InMemRefreshTokenStore } from './dal/inmem-refresh-token.store';
export { permissionsForRole, PERMISSIONS } from './policies/role-permissions.policy';
export type { Permission } from './policies/role-permissions.policy';
export type { Principal, TokenPairResponse } from './auth.types';
