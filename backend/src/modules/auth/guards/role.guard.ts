/**
 * src/modules/auth/guards/role.guard.ts
 *
 * RULE:
 * - allow if identity.role ∈ requiredRoles
 * - allow if identity.role === 'ADMIN' (superuser over every role-gated route)
 * - otherwise 403 (caller is known, just not permitted)
 *
 * Must run after AuthGuard.requireAuth; without an identity it answers 401.
 */

import type { FastifyRequest } from 'fastify';

import { requireIdentity } from '../../../shared/http/require-auth-context';
import type { AuthIdentity } from '../../../shared/http/require-auth-context';
import type { Role } from '../../users/user.types';
import { AuthErrors } from '../auth.errors';
import type { RouteGuard } from './auth.guard';

export type AuthorizationResult = { ok: true } | { ok: false; reason: 'insufficient_role' };

export interface Authorizer {
  authorize(identity: Pick<AuthIdentity, 'role'>, requiredRoles: ReadonlySet<Role>): AuthorizationResult;
}

const ALLOW: AuthorizationResult = { ok: true };
const DENY: AuthorizationResult = { ok: false, reason: 'insufficient_role' };

export class RoleGuard implements Authorizer {
  authorize(identity: Pick<AuthIdentity, 'role'>, requiredRoles: ReadonlySet<Role>): AuthorizationResult {
    const role = identity.role;
    switch (role) {
      case 'ADMIN':
        return ALLOW;
      case 'MODERATOR':
      case 'USER':
        return requiredRoles.has(role) ? ALLOW : DENY;
      default: {
        const unreachable: never = role;
        throw new Error(`RoleGuard: unknown role ${String(unreachable)}`);
      }
    }
  }

  requireRoles(...roles: Role[]): RouteGuard {
    const required: ReadonlySet<Role> = new Set(roles);

    return async (req: FastifyRequest) => {
      const identity = requireIdentity(req);
      const decision = this.authorize(identity, required);

      if (!decision.ok) {
        throw AuthErrors.forbidden({
          reason: decision.reason,
          role: identity.role,
          requiredRoles: [...required],
        });
      }
    };
  }
}
