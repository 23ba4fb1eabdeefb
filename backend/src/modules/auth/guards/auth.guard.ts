/**
 * src/modules/auth/guards/auth.guard.ts
 *
 * WHY:
 * - Single gate in front of every protected route.
 * - Composes TokenService (signature + expiry) with RevocationStore (logout).
 *
 * GUARD SEQUENCE (short-circuits on first failure, all → 401):
 * 1) no token in Authorization header or cookie   reason: missing_token
 * 2) TokenService.verify fails                     reason: malformed | signature_invalid | expired
 * 3) token id found in RevocationStore             reason: revoked
 * 4) success → req.authContext = { userId, role, tokenId, expiresAt }
 *
 * RULES:
 * - Read path only: never writes to the revocation store.
 * - The reason goes into AppError.meta (logged), never into the response body.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { extractAccessToken } from '../../../shared/http/access-token';
import type { AuthIdentity } from '../../../shared/http/require-auth-context';
import type { RevocationStore } from '../../../shared/revocation/revocation.types';
import { revocationTokenId } from '../../../shared/revocation/revocation.types';
import { claimsExpiry } from '../../../shared/security/token-service';
import type { TokenService } from '../../../shared/security/token-service';
import { AuthErrors } from '../auth.errors';

/** Fastify preHandler shape used by both guards. */
export type RouteGuard = (req: FastifyRequest, reply: FastifyReply) => Promise<void>;

export interface Authenticator {
  authenticate(req: FastifyRequest): Promise<AuthIdentity>;
}

export class AuthGuard implements Authenticator {
  constructor(
    private readonly deps: {
      tokenService: TokenService;
      revocationStore: RevocationStore;
    },
  ) {}

  async authenticate(req: FastifyRequest): Promise<AuthIdentity> {
    const token = extractAccessToken(req);
    if (!token) {
      throw AuthErrors.unauthenticated({ reason: 'missing_token' });
    }

    const verified = await this.deps.tokenService.verify(token);
    if (!verified.ok) {
      throw AuthErrors.unauthenticated({ reason: verified.reason });
    }

    const { claims } = verified;
    const tokenId = revocationTokenId(claims.sub, claims.jti);

    if (await this.deps.revocationStore.isRevoked(tokenId)) {
      throw AuthErrors.unauthenticated({ reason: 'revoked', userId: claims.sub });
    }

    const identity: AuthIdentity = {
      userId: claims.sub,
      role: claims.role,
      tokenId,
      expiresAt: claimsExpiry(claims),
    };

    req.authContext = { ...identity };
    return identity;
  }

  readonly requireAuth: RouteGuard = async (req) => {
    await this.authenticate(req);
  };
}
