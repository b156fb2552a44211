/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP → UserService for the admin directory endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (admin check lives in the service policy).
 * - Bearer auth is required on every route (requireAuth → 401).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireAuth } from '../../shared/http/require-auth-context';
import type { UserService } from './user.service';
import {
  createUserSchema,
  listUsersQuerySchema,
  updateUserSchema,
  userIdParamsSchema,
} from './user.schemas';
import { UserErrors } from './user.errors';
import { toUserResponse } from './user.response';

export class UserController {
  constructor(private readonly userService: UserService) {}

  private context(req: FastifyRequest) {
    const auth = requireAuth(req);
    return {
      actor: { userId: auth.userId, role: auth.role },
      requestId: req.requestContext.requestId,
    };
  }

  private parseUserId(req: FastifyRequest): string {
    const parsed = userIdParamsSchema.safeParse(req.params);
    if (!parsed.success) throw UserErrors.invalidUserId();
    return parsed.data.id;
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const ctx = this.context(req);

    const parsed = listUsersQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query parameters', {
        issues: parsed.error.issues,
      });
    }

    const page = await this.userService.list(ctx, parsed.data);

    return reply.status(200).send({
      items: page.items.map(toUserResponse),
      total: page.total,
      offset: page.offset,
      limit: page.limit,
    });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const ctx = this.context(req);
    const id = this.parseUserId(req);

    const user = await this.userService.get(ctx, id);
    return reply.status(200).send(toUserResponse(user));
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const ctx = this.context(req);

    const parsed = createUserSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const body = parsed.data;
    const user = await this.userService.create(ctx, {
      lastName: body.last_name,
      firstName: body.first_name,
      middleName: body.middle_name,
      login: body.login,
      password: body.password,
      role: body.role,
      gender: body.gender,
      className: body.class_name,
      graduationYear: body.graduation_year,
    });

    return reply.status(201).send(toUserResponse(user));
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const ctx = this.context(req);
    const id = this.parseUserId(req);

    const parsed = updateUserSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const body = parsed.data;
    const user = await this.userService.update(ctx, id, {
      lastName: body.last_name,
      firstName: body.first_name,
      middleName: body.middle_name,
      login: body.login,
      password: body.password,
      role: body.role,
      gender: body.gender,
      className: body.class_name,
      graduationYear: body.graduation_year,
    });

    return reply.status(200).send(toUserResponse(user));
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const ctx = this.context(req);
    const id = this.parseUserId(req);

    await this.userService.delete(ctx, id);
    return reply.status(204).send();
  }
}
