/**
 * backend/src/modules/users/user.routes.ts
 *
 * Route table for /api/users. Every route runs AuthGuard first; role-gated
 * routes add RoleGuard after it.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthGuard } from '../auth/guards/auth.guard';
import type { RoleGuard } from '../auth/guards/role.guard';
import type { UserController } from './user.controller';

export function registerUserRoutes(
  app: FastifyInstance,
  controller: UserController,
  guards: { authGuard: AuthGuard; roleGuard: RoleGuard },
) {
  const { authGuard, roleGuard } = guards;

  app.get(
    '/api/users',
    { preHandler: [authGuard.requireAuth, roleGuard.requireRoles('ADMIN', 'MODERATOR')] },
    controller.listUsers.bind(controller),
  );
  app.get(
    '/api/users/me',
    { preHandler: authGuard.requireAuth },
    controller.getMe.bind(controller),
  );
  app.patch(
    '/api/users/me/name',
    { preHandler: authGuard.requireAuth },
    controller.updateName.bind(controller),
  );
  app.patch(
    '/api/users/me/password',
    { preHandler: authGuard.requireAuth },
    controller.updatePassword.bind(controller),
  );
  app.put(
    '/api/users/role',
    { preHandler: [authGuard.requireAuth, roleGuard.requireRoles('ADMIN')] },
    controller.updateRole.bind(controller),
  );
}
