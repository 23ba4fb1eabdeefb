/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who is calling) and authorization (may they do this) are
 *   separate steps; this is the hand-off point between them.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context (all null) on every request.
 * 2. AuthGuard (modules/auth/guards) overwrites it on protected routes once the
 *    token has been verified and checked against the revocation store.
 * 3. RoleGuard and controllers read req.authContext.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Role } from '../../modules/users/user.types';

export type AuthContext = {
  userId: string | null;
  role: Role | null;

  // Token fields (populated by AuthGuard)
  tokenId: string | null;
  expiresAt: Date | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function emptyAuthContext(): AuthContext {
  return { userId: null, role: null, tokenId: null, expiresAt: null };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = emptyAuthContext();
    done();
  });
}
