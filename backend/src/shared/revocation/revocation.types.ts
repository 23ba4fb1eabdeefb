/**
 * src/shared/revocation/revocation.types.ts
 *
 * Revoked tokens are keyed by `revoked:{subject}:{jti}`.
 * An entry only has to outlive the token it blocks: once the token's `exp`
 * has passed, TokenService rejects it as expired on its own.
 */

export const REVOCATION_KEY_PREFIX = 'revoked';

export interface RevocationStore {
  revoke(tokenId: string, expiresAt: Date): Promise<void>;
  isRevoked(tokenId: string): Promise<boolean>;
}

/** Identifier for a single issued token. */
export function revocationTokenId(subject: string, jti: string): string {
  return `${subject}:${jti}`;
}
