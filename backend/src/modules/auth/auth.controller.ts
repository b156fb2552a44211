/**
 * backend/src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for all /auth endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Logout answers 200 whatever the body or token state was; it must not
 *   reveal whether a refresh token was valid.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireAuth } from '../../shared/http/require-auth-context';
import { withRequestContext } from '../../shared/logger/with-context';
import { toUserResponse } from '../users';
import { loginSchema, logoutSchema, refreshSchema } from './auth.schemas';
import type { AuthService } from './auth.service';
import type { VerifyResponse } from './auth.types';

const LOGOUT_RESPONSE = { ok: true } as const;

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.login({
      login: parsed.data.login,
      password: parsed.data.password,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const parsed = refreshSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.refresh({
      refreshToken: parsed.data.refresh_token,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const parsed = logoutSchema.safeParse(req.body);
    if (!parsed.success) {
      withRequestContext(req).info('auth.logout', {
        flow: 'auth.logout',
        outcome: 'invalid_body',
      });
      return reply.status(200).send(LOGOUT_RESPONSE);
    }

    await this.authService.logout({
      refreshToken: parsed.data.refresh_token,
      requestId: req.requestContext.requestId,
      userId: req.authContext.userId,
    });

    return reply.status(200).send(LOGOUT_RESPONSE);
  }

  async verify(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireAuth(req);

    const body: VerifyResponse = {
      user_id: auth.userId,
      role: auth.role,
      permissions: [...auth.permissions],
    };

    return reply.status(200).send(body);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireAuth(req);

    const user = await this.authService.getCurrentUser(auth);
    return reply.status(200).send(toUserResponse(user));
  }

  async jwks(_req: FastifyRequest, reply: FastifyReply) {
    return reply.status(200).send(this.authService.jwks());
  }
}
