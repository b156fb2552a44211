/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1) request context (requestId)
 * 2) auth context stub (anonymous)
 * 3) bearer auth (fills auth context from a verified access token)
 * 4) request log line
 */

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: {
  config: AppConfig;
  deps: AppDeps;
}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: 64 * 1024,
  });

  registerRequestContext(app);
  registerAuthContext(app);
  opts.deps.auth.registerHooks(app);

  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    logger.http('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
      userId: req.authContext.userId,
    });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    logger.http('response', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      requestId: req.requestContext.requestId,
      durationMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  return app;
}
