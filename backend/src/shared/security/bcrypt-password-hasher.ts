/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * bcrypt behind PasswordHasher. The async bcrypt calls run on libuv's thread
 * pool, so a hash in flight does not hold up other requests on the event loop.
 */

import bcrypt from 'bcrypt';
import { HashingError } from './password-hasher';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    try {
      return await bcrypt.hash(plain, this.cost);
    } catch (err) {
      throw new HashingError('bcrypt hash failed', { cause: err });
    }
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plain, hash);
    } catch (err) {
      throw new HashingError('bcrypt compare failed', { cause: err });
    }
  }
}
