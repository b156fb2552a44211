/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes -> (optional) admin seed
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runAdminSeed } from '../shared/db/seed/admin-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer({ config, deps });

  await registerRoutes(app, { config, deps });

  if (config.seed.enabled) {
    await runAdminSeed({
      userRepo: deps.persistence.userRepo,
      passwordHasher: deps.passwordHasher,
      logger,
      options: {
        login: config.seed.adminLogin,
        password: config.seed.adminPassword,
      },
    });
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
