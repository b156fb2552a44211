/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares the admin user directory endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.get('/users', controller.list.bind(controller));
  app.get('/users/:id', controller.get.bind(controller));
  app.post('/users', controller.create.bind(controller));
  app.patch('/users/:id', controller.update.bind(controller));
  app.delete('/users/:id', controller.remove.bind(controller));
}
