/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates an ADMIN user (if missing) so role-gated routes can be exercised
 * locally. Roles can only be changed by an admin, so someone has to be first.
 *
 * Idempotent: safe to run on every start. An existing user with the same
 * email is left untouched, whatever its role.
 */

import type { UserRepository } from '../../../modules/users/dal/user.repo';
import type { PasswordHasher } from '../../security/password-hasher';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  adminEmail: string;
  adminPassword: string;
};

export async function runDevSeed(opts: {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<void> {
  const { userRepo, passwordHasher, options } = opts;
  const flow = 'seed.dev';

  const existing = await userRepo.findByEmail(options.adminEmail);
  if (existing) {
    logger.info('seed.admin.exists', { flow, userId: existing.id, role: existing.role });
    return;
  }

  const inserted = await userRepo.insert({
    email: options.adminEmail,
    name: 'Admin',
    passwordHash: await passwordHasher.hash(options.adminPassword),
    role: 'ADMIN',
  });

  if (inserted.kind === 'email_taken') {
    // Lost a race with another instance seeding at the same time.
    logger.info('seed.admin.exists', { flow });
    return;
  }

  logger.info('seed.admin.created', { flow, userId: inserted.user.id });
}
