/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Services depend on an interface (DIP), not on bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 *
 * CONTRACT:
 * - hash() salts every call: two hashes of the same password differ.
 * - verify() returns false on mismatch; it never throws for a wrong password.
 * - Both throw HashingError only when the hashing backend itself fails.
 *   That is fatal for the request and surfaces as a generic 500.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}

export class HashingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HashingError';
  }
}
