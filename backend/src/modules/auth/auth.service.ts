/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates register, login and logout on top of PasswordHasher,
 *   TokenService, RevocationStore and the user repository.
 *
 * RULES:
 * - Never store/log raw passwords or tokens. Emails are logged as domain only.
 * - login(): unknown email and wrong password raise the SAME error, and the
 *   unknown-email path still pays for one bcrypt comparison.
 * - logout(): an already-invalid token is a no-op success.
 * - Nothing is committed (token issued, revocation written) until every
 *   computation before it has succeeded.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenService } from '../../shared/security/token-service';
import { claimsExpiry } from '../../shared/security/token-service';
import type { RevocationStore } from '../../shared/revocation/revocation.types';
import { revocationTokenId } from '../../shared/revocation/revocation.types';

import type { UserRepository } from '../users/dal/user.repo';
import type { User } from '../users/user.types';

import { AuthErrors } from './auth.errors';
import type { LoginResult } from './auth.types';
import { emailDomain } from '../../shared/logger/pii';

// ── Params ──────────────────────────────────────────────────

export type RegisterParams = {
  email: string;
  password: string;
  name?: string;
  requestId: string;
};

export type LoginParams = {
  email: string;
  password: string;
  requestId: string;
};

export type LogoutParams = {
  token: string | null;
  requestId: string;
};

// Compared against when the email is unknown, so both failure paths cost one bcrypt run.
const TIMING_EQUALIZER_PASSWORD = 'timing-equalizer-not-a-real-password';

// ── Service ─────────────────────────────────────────────────

export class AuthService {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly deps: {
      userRepo: UserRepository;
      passwordHasher: PasswordHasher;
      tokenService: TokenService;
      revocationStore: RevocationStore;
      logger: Logger;
    },
  ) {}

  /**
   * Computes the unknown-email comparison hash ahead of the first login, so the
   * first miss costs one bcrypt run like every later one. Called by buildApp.
   */
  async warmUp(): Promise<void> {
    await this.getDummyHash();
  }

  private getDummyHash(): Promise<string> {
    if (this.dummyHash) return this.dummyHash;

    // One shared computation for concurrent callers; a failure is not cached.
    const pending = this.deps.passwordHasher.hash(TIMING_EQUALIZER_PASSWORD).catch((err: unknown) => {
      this.dummyHash = null;
      throw err;
    });
    this.dummyHash = pending;
    return pending;
  }

  // ── Register ─────────────────────────────────────────────

  async register(params: RegisterParams): Promise<User> {
    const email = params.email.toLowerCase();

    this.deps.logger.info({
      msg: 'auth.register.start',
      flow: 'auth.register',
      requestId: params.requestId,
      emailDomain: emailDomain(email),
    });

    const passwordHash = await this.deps.passwordHasher.hash(params.password);

    const inserted = await this.deps.userRepo.insert({
      email,
      name: params.name ?? null,
      passwordHash,
    });

    if (inserted.kind === 'email_taken') {
      throw AuthErrors.emailAlreadyExists({ emailDomain: emailDomain(email) });
    }

    const { passwordHash: _passwordHash, ...user } = inserted.user;

    this.deps.logger.info({
      msg: 'auth.register.success',
      flow: 'auth.register',
      requestId: params.requestId,
      userId: user.id,
      role: user.role,
    });

    return user;
  }

  // ── Login ────────────────────────────────────────────────

  async login(params: LoginParams): Promise<LoginResult> {
    const email = params.email.toLowerCase();

    this.deps.logger.info({
      msg: 'auth.login.start',
      flow: 'auth.login',
      requestId: params.requestId,
      emailDomain: emailDomain(email),
    });

    const user = await this.deps.userRepo.findByEmail(email);

    if (!user) {
      await this.deps.passwordHasher.verify(params.password, await this.getDummyHash());
      throw AuthErrors.invalidCredentials({
        reason: 'user_not_found',
        emailDomain: emailDomain(email),
      });
    }

    const passwordValid = await this.deps.passwordHasher.verify(params.password, user.passwordHash);
    if (!passwordValid) {
      throw AuthErrors.invalidCredentials({ reason: 'wrong_password', userId: user.id });
    }

    const { token, claims } = await this.deps.tokenService.issue({
      subjectId: user.id,
      role: user.role,
    });

    this.deps.logger.info({
      msg: 'auth.login.success',
      flow: 'auth.login',
      requestId: params.requestId,
      userId: user.id,
      role: user.role,
      jti: claims.jti,
    });

    return {
      token,
      expiresAt: claimsExpiry(claims),
      ttlSeconds: claims.exp - claims.iat,
    };
  }

  // ── Logout ───────────────────────────────────────────────

  async logout(params: LogoutParams): Promise<void> {
    if (!params.token) {
      this.deps.logger.info({
        msg: 'auth.logout.noop',
        flow: 'auth.logout',
        requestId: params.requestId,
        reason: 'missing_token',
      });
      return;
    }

    const verified = await this.deps.tokenService.verify(params.token);
    if (!verified.ok) {
      this.deps.logger.info({
        msg: 'auth.logout.noop',
        flow: 'auth.logout',
        requestId: params.requestId,
        reason: verified.reason,
      });
      return;
    }

    const { claims } = verified;
    await this.deps.revocationStore.revoke(
      revocationTokenId(claims.sub, claims.jti),
      claimsExpiry(claims),
    );

    this.deps.logger.info({
      msg: 'auth.logout.success',
      flow: 'auth.logout',
      requestId: params.requestId,
      userId: claims.sub,
      jti: claims.jti,
    });
  }
}
