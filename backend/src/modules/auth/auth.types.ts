/**
 * src/modules/auth/auth.types.ts
 *
 * Result types for the auth flows. Never carry raw passwords or hashes.
 */

export type LoginResult = {
  token: string;
  expiresAt: Date;
  /** Seconds until expiry; drives the cookie Max-Age. */
  ttlSeconds: number;
};

export type LoginResponse = {
  token: string;
};
