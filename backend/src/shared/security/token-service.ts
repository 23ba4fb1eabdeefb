/**
 * backend/src/shared/security/token-service.ts
 *
 * WHY:
 * - Access tokens are signed, time-bound identity assertions.
 * - Callers (AuthGuard, AuthService) depend on this interface, not on jose.
 *
 * VERIFY OUTCOMES (disjoint):
 * - ok           signature valid, claims well-formed, now <= exp
 * - malformed    not a compact JWS, payload not JSON, or claims fail the schema
 * - signature_invalid  tampered, signed with another secret, or disallowed alg
 * - expired      now > exp
 *
 * Revocation is NOT checked here; AuthGuard composes this with RevocationStore.
 */

import { z } from 'zod';
import { ROLES } from '../../modules/users/user.types';
import type { Role } from '../../modules/users/user.types';

export const TokenClaimsSchema = z
  .object({
    sub: z.string().min(1),
    role: z.enum(ROLES),
    iat: z.number().int().nonnegative(),
    exp: z.number().int().positive(),
    jti: z.string().min(1),
  })
  .refine((c) => c.exp > c.iat, { message: 'exp must be later than iat' });

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

export type TokenFailureReason = 'malformed' | 'signature_invalid' | 'expired';

export type TokenVerifyResult =
  | { ok: true; claims: TokenClaims }
  | { ok: false; reason: TokenFailureReason };

export type IssueTokenParams = {
  subjectId: string;
  role: Role;
  /** Falls back to the configured default TTL. */
  ttlSeconds?: number;
};

export type IssuedToken = {
  token: string;
  claims: TokenClaims;
};

export interface TokenService {
  issue(params: IssueTokenParams): Promise<IssuedToken>;
  verify(token: string): Promise<TokenVerifyResult>;
}

export function claimsExpiry(claims: Pick<TokenClaims, 'exp'>): Date {
  return new Date(claims.exp * 1000);
}
