/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';
import type { AuthGuard } from './guards/auth.guard';

export function registerAuthRoutes(
  app: FastifyInstance,
  controller: AuthController,
  authGuard: AuthGuard,
) {
  app.post('/api/auth/register', controller.register.bind(controller));
  app.post('/api/auth/login', controller.login.bind(controller));
  app.post(
    '/api/auth/logout',
    { preHandler: authGuard.requireAuth },
    controller.logout.bind(controller),
  );
}
