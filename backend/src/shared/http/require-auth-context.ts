/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "is there an identity?" checks.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { Role } from '../../modules/users/user.types';

export type AuthIdentity = Readonly<{
  userId: string;
  role: Role;
  tokenId: string;
  expiresAt: Date;
}>;

/**
 * Returns the identity AuthGuard attached, or throws 401.
 * Role checks belong to RoleGuard, not here.
 */
export function requireIdentity(req: FastifyRequest): AuthIdentity {
  const ctx = req.authContext;
  if (!ctx || !ctx.userId || !ctx.role || !ctx.tokenId || !ctx.expiresAt) {
    throw AppError.unauthenticated('Authentication required', { reason: 'no_identity' });
  }

  return {
    userId: ctx.userId,
    role: ctx.role,
    tokenId: ctx.tokenId,
    expiresAt: ctx.expiresAt,
  };
}
