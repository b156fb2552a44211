/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should include requestId + the authenticated principal so we can
 *   trace a full request.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 * - Returns a winston child logger; per-call meta wins over the request fields.
 */

import type { FastifyRequest } from 'fastify';
import { logger, type Logger } from './logger';

export function withRequestContext(req: Pick<FastifyRequest, 'requestContext' | 'authContext'>): Logger {
  // Both decorations start as null until their onRequest hooks run.
  return logger.child({
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host ?? null,
    userId: req.authContext?.userId ?? null,
    role: req.authContext?.role ?? null,
  });
}
