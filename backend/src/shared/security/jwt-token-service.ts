/**
 * backend/src/shared/security/jwt-token-service.ts
 *
 * WHY:
 * - Concrete TokenService: compact JWS (HS256) over JSON claims, via jose.
 * - The signing secret is handed in once by the composition root and never
 *   changes for the lifetime of the process (no key rotation).
 *
 * HOW:
 * - issue(): iat = now (seconds), exp = iat + max(ttl, 1) so exp > iat always holds.
 * - verify(): compactVerify checks structure + signature only; claims are then
 *   validated with Zod and expiry is decided here (now > exp) against the
 *   injected clock, so tests can move time without sleeping.
 *
 * RULES:
 * - Pure with respect to process state: no I/O, no revocation lookups.
 * - Never log tokens.
 */

import { randomUUID } from 'node:crypto';
import { SignJWT, compactVerify, errors } from 'jose';

import { TokenClaimsSchema } from './token-service';
import type {
  IssueTokenParams,
  IssuedToken,
  TokenClaims,
  TokenService,
  TokenVerifyResult,
} from './token-service';

const ALG = 'HS256';
const MIN_SECRET_LENGTH = 32;

export class JwtTokenService implements TokenService {
  private readonly key: Uint8Array;
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;

  constructor(opts: { secret: string; defaultTtlSeconds: number; now?: () => number }) {
    if (opts.secret.length < MIN_SECRET_LENGTH) {
      throw new Error(
        `JwtTokenService: secret must be at least ${MIN_SECRET_LENGTH} characters. Got ${opts.secret.length}.`,
      );
    }

    this.key = new TextEncoder().encode(opts.secret);
    this.defaultTtlSeconds = opts.defaultTtlSeconds;
    this.now = opts.now ?? Date.now;
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }

  async issue(params: IssueTokenParams): Promise<IssuedToken> {
    const ttlSeconds = Math.max(params.ttlSeconds ?? this.defaultTtlSeconds, 1);
    const iat = this.nowSeconds();

    const claims: TokenClaims = {
      sub: params.subjectId,
      role: params.role,
      iat,
      exp: iat + ttlSeconds,
      jti: randomUUID(),
    };

    const token = await new SignJWT({ role: claims.role })
      .setProtectedHeader({ alg: ALG, typ: 'JWT' })
      .setSubject(claims.sub)
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .setJti(claims.jti)
      .sign(this.key);

    return { token, claims };
  }

  async verify(token: string): Promise<TokenVerifyResult> {
    let payload: Uint8Array;

    try {
      ({ payload } = await compactVerify(token, this.key, { algorithms: [ALG] }));
    } catch (err) {
      if (
        err instanceof errors.JWSSignatureVerificationFailed ||
        err instanceof errors.JOSEAlgNotAllowed
      ) {
        return { ok: false, reason: 'signature_invalid' };
      }
      if (err instanceof errors.JOSEError) {
        return { ok: false, reason: 'malformed' };
      }
      throw err;
    }

    const claims = parseClaims(payload);
    if (!claims) return { ok: false, reason: 'malformed' };

    if (this.nowSeconds() > claims.exp) {
      return { ok: false, reason: 'expired' };
    }

    return { ok: true, claims };
  }
}

function parseClaims(payload: Uint8Array): TokenClaims | null {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder().decode(payload));
  } catch {
    return null;
  }

  const parsed = TokenClaimsSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
