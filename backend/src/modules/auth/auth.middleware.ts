/**
 * backend/src/modules/auth/auth.middleware.ts
 *
 * WHY:
 * - Populates req.authContext from `Authorization: Bearer <access token>`.
 *
 * HOW IT WORKS:
 * - Runs after registerAuthContext() has set the anonymous stub.
 * - Best effort: a missing, malformed or rejected token leaves the request
 *   anonymous. Routes that need auth call requireAuth() and get a 401.
 * - Rejection reasons are logged at debug level, never the token.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import { withRequestContext } from '../../shared/logger/with-context';
import type { AuthService } from './auth.service';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header);
  return match?.[1] ?? null;
}

export function registerBearerAuth(app: FastifyInstance, authService: AuthService) {
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    const header = req.headers.authorization;
    if (!header) return done();

    const token = extractBearerToken(header);
    if (!token) {
      withRequestContext(req).debug('auth.bearer.rejected', {
        flow: 'auth.bearer',
        reason: 'bad_scheme',
      });
      return done();
    }

    const result = authService.tryVerify(token);
    if (!result.ok) {
      withRequestContext(req).debug('auth.bearer.rejected', {
        flow: 'auth.bearer',
        reason: result.reason,
      });
      return done();
    }

    req.authContext = {
      userId: result.principal.userId,
      role: result.principal.role,
      permissions: result.principal.permissions,
    };

    done();
  });
}
