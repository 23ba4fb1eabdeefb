/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Owns the RevocationStore: the only shared mutable state in the process.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (in-memory vs Redis revocation) belong HERE,
 *   not inside the classes themselves (DIP).
 * - Tests pass overrides instead of touching env vars.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import type { Cache } from '../shared/cache/cache';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import type { TokenService } from '../shared/security/token-service';
import { JwtTokenService } from '../shared/security/jwt-token-service';

import type { RevocationStore } from '../shared/revocation/revocation.types';
import { CacheRevocationStore } from '../shared/revocation/revocation.store';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuthGuard } from '../modules/auth/guards/auth.guard';
import { RoleGuard } from '../modules/auth/guards/role.guard';

import type { UserRepository } from '../modules/users/dal/user.repo';
import { KyselyUserRepo } from '../modules/users/dal/user.repo';
import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type DepsOverrides = {
  /** Replaces the Kysely repository; no database pool is created when set. */
  userRepo?: UserRepository;
  /** Replaces the revocation backend (Redis or in-memory). */
  cache?: Cache;
  passwordHasher?: PasswordHasher;
  /** Clock (epoch ms) shared by the token service and the in-memory cache. */
  now?: () => number;
};

export type AppDeps = {
  db: Db | null;
  cache: Cache;

  logger: Logger;

  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  revocationStore: RevocationStore;

  authGuard: AuthGuard;
  roleGuard: RoleGuard;

  // modules
  users: UserModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const now = overrides.now ?? Date.now;

  let db: Db | null = null;
  let userRepo: UserRepository;
  if (overrides.userRepo) {
    userRepo = overrides.userRepo;
  } else {
    db = createDb(config.databaseUrl);
    userRepo = new KyselyUserRepo(db);
  }

  // Redis is optional: without it revoked tokens live in process memory.
  let redis: RedisCache | null = null;
  let cache: Cache;
  if (overrides.cache) {
    cache = overrides.cache;
  } else if (config.redisUrl) {
    redis = await RedisCache.connect(config.redisUrl);
    cache = redis;
  } else {
    cache = new InMemCache({ now });
  }

  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  const tokenService: TokenService = new JwtTokenService({
    secret: config.jwt.secret,
    defaultTtlSeconds: config.jwt.maxAgeMinutes * 60,
    now,
  });

  const revocationStore: RevocationStore = new CacheRevocationStore(cache, { now });

  const authGuard = new AuthGuard({ tokenService, revocationStore });
  const roleGuard = new RoleGuard();

  // modules (no HTTP / no business logic here)
  const users = createUserModule({
    userRepo,
    passwordHasher,
    logger,
    authGuard,
    roleGuard,
  });

  const auth = createAuthModule({
    userRepo: users.userRepo,
    passwordHasher,
    tokenService,
    revocationStore,
    authGuard,
    logger,
    isProduction: config.nodeEnv === 'production',
  });

  return {
    db,
    cache,
    logger,
    passwordHasher,
    tokenService,
    revocationStore,
    authGuard,
    roleGuard,
    users,
    auth,
    close: async () => {
      if (redis) await redis.close();
      if (db) await db.destroy();
    },
  };
}
