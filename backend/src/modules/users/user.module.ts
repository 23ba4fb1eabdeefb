/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Exposes userRepo so the auth module (and the dev seed) share one repository.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AuthGuard } from '../auth/guards/auth.guard';
import type { RoleGuard } from '../auth/guards/role.guard';
import type { UserRepository } from './dal/user.repo';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  logger: Logger;
  authGuard: AuthGuard;
  roleGuard: RoleGuard;
}) {
  const userService = new UserService({
    userRepo: deps.userRepo,
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
  });

  const controller = new UserController(userService);

  return {
    userRepo: deps.userRepo,
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller, {
        authGuard: deps.authGuard,
        roleGuard: deps.roleGuard,
      });
    },
  };
}
