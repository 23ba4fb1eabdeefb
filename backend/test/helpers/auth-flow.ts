import type { FastifyInstance } from 'fastify';
import type { UserRepository } from '../../src/modules/users/dal/user.repo';
import type { Role, UserWithPasswordHash } from '../../src/modules/users/user.types';
import type { PasswordHasher } from '../../src/shared/security/password-hasher';

/**
 * WHY:
 * - Most E2E specs need "a user with role X and a token" before the real assertion.
 * - Seeding goes through the repository (role cannot be chosen at /register);
 *   the token always comes from the real /api/auth/login.
 */

export async function seedUser(opts: {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  email: string;
  password: string;
  role?: Role;
  name?: string;
}): Promise<UserWithPasswordHash> {
  const inserted = await opts.userRepo.insert({
    email: opts.email,
    name: opts.name ?? null,
    passwordHash: await opts.passwordHasher.hash(opts.password),
    role: opts.role ?? 'USER',
  });

  if (inserted.kind !== 'created') {
    throw new Error(`seedUser: email already taken: ${opts.email}`);
  }
  return inserted.user;
}

export async function loginForToken(
  app: FastifyInstance,
  creds: { email: string; password: string },
): Promise<string> {
  const res = await app.inject({
    method: 'POST',
    url: '/api/auth/login',
    payload: creds,
  });

  if (res.statusCode !== 200) {
    throw new Error(`loginForToken: expected 200, got ${res.statusCode}: ${res.body}`);
  }
  return res.json<{ token: string }>().token;
}

export function bearer(token: string): { authorization: string } {
  return { authorization: `Bearer ${token}` };
}
