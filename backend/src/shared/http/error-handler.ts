/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Transient DB failures → 503 with Retry-After (caller may retry).
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify client errors (bad JSON, wrong content-type, body too large) → their 4xx.
 * - Unexpected errors → 500 with generic message.
 * - Unknown routes → 404 in the same envelope.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (including REDACTED meta) for observability.
 * - Always use withRequestContext(req) so requestId, userId and role are
 *   automatically included in every log line.
 */

import type { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from './errors';
import { isTransientDbError } from '../db/db-errors';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

export const RETRY_AFTER_SECONDS = 5;

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'access_token',
  'refreshToken',
  'refresh_token',
  'authorization',
  'password',
  'passwordHash',
  'password_hash',
  'secret',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object' || Array.isArray(meta)) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function clientErrorCode(status: number): string {
  switch (status) {
    case 400:
      return 'VALIDATION_ERROR';
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    default:
      return 'BAD_REQUEST';
  }
}

function isFastifyClientError(err: FastifyError): err is FastifyError & { statusCode: number } {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      if (err.status === 503) {
        void reply.header('retry-after', String(RETRY_AFTER_SECONDS));
      }

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Storage timeouts / lost connections are retryable
    if (isTransientDbError(err)) {
      log.error('db_unavailable', {
        flow: 'http.error',
        message: err.message,
      });

      const unavailable = AppError.serviceUnavailable();
      return reply
        .status(unavailable.status)
        .header('retry-after', String(RETRY_AFTER_SECONDS))
        .send(buildResponse(unavailable.code, unavailable.message));
    }

    // 3) Zod safety net
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 4) Fastify's own client errors (malformed JSON, unsupported media type, ...)
    if (isFastifyClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        status: err.statusCode,
        fastifyCode: err.code,
        message: err.message,
      });

      return reply
        .status(err.statusCode)
        .send(buildResponse(clientErrorCode(err.statusCode), err.message));
    }

    // 5) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    const internal = AppError.internal();
    return reply.status(internal.status).send(buildResponse(internal.code, internal.message));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    return reply
      .status(404)
      .send(buildResponse('NOT_FOUND', `Route ${req.method} ${req.url} not found`));
  });
}
