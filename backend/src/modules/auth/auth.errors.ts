/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: messages never reveal whether an email exists or why a
 *   token was rejected. The reason travels in meta, which is logged only.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: unknown email OR wrong password. Intentionally identical. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.invalidCredentials('Invalid email or password.', meta);
  },

  /** Registration: email already taken (DB unique constraint). */
  emailAlreadyExists(meta?: AppErrorMeta) {
    return AppError.conflict('EMAIL_ALREADY_EXISTS', 'A user with this email already exists.', meta);
  },

  /**
   * Missing, malformed, tampered, expired or revoked token.
   *
   * SECURITY: one client-facing error for all five. `meta.reason` keeps the
   * distinction for logs.
   */
  unauthenticated(meta?: AppErrorMeta) {
    return AppError.unauthenticated('Authentication required', meta);
  },

  /** Authenticated, but the role is not allowed on this route. */
  forbidden(meta?: AppErrorMeta) {
    return AppError.forbidden('You are not allowed to perform this action.', meta);
  },
} as const;
