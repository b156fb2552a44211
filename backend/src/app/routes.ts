/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (auth, users)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export async function registerRoutes(
  app: FastifyInstance,
  opts: { config: AppConfig; deps: AppDeps },
): Promise<void> {
  // Liveness + smoke check. Does not touch storage.
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  await opts.deps.auth.registerRoutes(app);
  opts.deps.users.registerRoutes(app);
}
