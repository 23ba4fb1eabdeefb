/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring: service + controller + routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in, guards included).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenService } from '../../shared/security/token-service';
import type { RevocationStore } from '../../shared/revocation/revocation.types';
import type { UserRepository } from '../users/dal/user.repo';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import type { AuthGuard } from './guards/auth.guard';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  revocationStore: RevocationStore;
  authGuard: AuthGuard;
  logger: Logger;
  isProduction: boolean;
}) {
  const authService = new AuthService({
    userRepo: deps.userRepo,
    passwordHasher: deps.passwordHasher,
    tokenService: deps.tokenService,
    revocationStore: deps.revocationStore,
    logger: deps.logger,
  });

  const controller = new AuthController(authService, deps.isProduction);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller, deps.authGuard);
    },
  };
}
