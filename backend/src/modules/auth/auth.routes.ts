/**
 * backend/src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Logout lives in its own encapsulated scope whose JSON parser never fails,
 *   so a malformed body still gets the uniform 200.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

function parseJsonOrUndefined(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

export async function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/auth/login', controller.login.bind(controller));
  app.post('/auth/refresh', controller.refresh.bind(controller));
  app.post('/auth/verify', controller.verify.bind(controller));
  app.get('/auth/me', controller.me.bind(controller));
  app.get('/auth/jwks', controller.jwks.bind(controller));

  await app.register(async (scope) => {
    scope.addContentTypeParser<string>('application/json', { parseAs: 'string' }, (_req, body, done) => {
      done(null, parseJsonOrUndefined(body));
    });
    scope.post('/auth/logout', controller.logout.bind(controller));
  });
}
