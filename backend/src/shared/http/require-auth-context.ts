/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require bearer auth" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 * - Role checks (admin-only) belong to module policies, not here.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { Role } from '../../modules/users/user.types';
import type { Permission } from '../../modules/auth/policies/role-permissions.policy';

export type RequiredAuthContext = Readonly<{
  userId: string;
  role: Role;
  permissions: readonly Permission[];
}>;

/**
 * Controller guard: requires a verified access token.
 * Missing, malformed, expired or tampered tokens all end here as the same 401.
 */
export function requireAuth(req: Pick<FastifyRequest, 'authContext'>): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.userId || !ctx.role) {
    throw AppError.unauthorized('Authentication required');
  }

  return {
    userId: ctx.userId,
    role: ctx.role,
    permissions: ctx.permissions,
  };
}
