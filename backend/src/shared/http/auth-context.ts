/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and authorization are separate concepts.
 * - The bearer middleware (modules/auth/auth.middleware.ts) populates this from a
 *   verified access token. Until then all fields are null (anonymous request).
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets stub (all null) on every request.
 * 2. Bearer middleware overwrites with the token's claims when the token verifies.
 * 3. Controllers read req.authContext through requireAuth().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Role } from '../../modules/users/user.types';
import type { Permission } from '../../modules/auth/policies/role-permissions.policy';

export type AuthContext = {
  userId: string | null;
  role: Role | null;
  permissions: readonly Permission[];
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function anonymousAuthContext(): AuthContext {
  return { userId: null, role: null, permissions: [] };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = anonymousAuthContext();
    done();
  });
}
