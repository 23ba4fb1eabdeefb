/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Profile reads/updates for the caller and admin role management.
 *
 * RULES:
 * - Identity (userId, role) comes from AuthGuard; this service never parses tokens.
 * - Never log passwords or hashes.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { UserRepository } from './dal/user.repo';
import { UserErrors } from './user.errors';
import type { Role, User } from './user.types';

export class UserService {
  constructor(
    private readonly deps: {
      userRepo: UserRepository;
      passwordHasher: PasswordHasher;
      logger: Logger;
    },
  ) {}

  async getMe(userId: string): Promise<User> {
    const user = await this.deps.userRepo.findById(userId);
    if (!user) throw UserErrors.subjectGone({ reason: 'user_not_found', userId });

    const { passwordHash: _passwordHash, ...publicFields } = user;
    return publicFields;
  }

  async listUsers(params: { page: number; limit: number }): Promise<{ users: User[]; total: number }> {
    const [users, total] = await Promise.all([
      this.deps.userRepo.listPage(params),
      this.deps.userRepo.count(),
    ]);
    return { users, total };
  }

  async updateName(params: { userId: string; name: string; requestId: string }): Promise<User> {
    const user = await this.deps.userRepo.updateName(params.userId, params.name);
    if (!user) throw UserErrors.subjectGone({ reason: 'user_not_found', userId: params.userId });

    this.deps.logger.info({
      msg: 'users.name.updated',
      flow: 'users.update_name',
      requestId: params.requestId,
      userId: user.id,
    });

    return user;
  }

  async updatePassword(params: {
    userId: string;
    oldPassword: string;
    newPassword: string;
    requestId: string;
  }): Promise<User> {
    const existing = await this.deps.userRepo.findById(params.userId);
    if (!existing) {
      throw UserErrors.subjectGone({ reason: 'user_not_found', userId: params.userId });
    }

    const matches = await this.deps.passwordHasher.verify(params.oldPassword, existing.passwordHash);
    if (!matches) {
      this.deps.logger.warn({
        msg: 'users.password.change_rejected',
        flow: 'users.update_password',
        requestId: params.requestId,
        userId: existing.id,
        reason: 'wrong_current_password',
      });
      throw UserErrors.wrongCurrentPassword();
    }

    const passwordHash = await this.deps.passwordHasher.hash(params.newPassword);
    const user = await this.deps.userRepo.updatePasswordHash(existing.id, passwordHash);
    if (!user) throw UserErrors.subjectGone({ reason: 'user_not_found', userId: existing.id });

    this.deps.logger.info({
      msg: 'users.password.updated',
      flow: 'users.update_password',
      requestId: params.requestId,
      userId: user.id,
    });

    return user;
  }

  /**
   * Admin-only (enforced by RoleGuard on the route).
   * Tokens already issued keep the role they were signed with until they expire.
   */
  async updateRole(params: {
    actorId: string;
    userId: string;
    role: Role;
    requestId: string;
  }): Promise<User> {
    const user = await this.deps.userRepo.updateRole(params.userId, params.role);
    if (!user) throw UserErrors.notFound({ userId: params.userId });

    this.deps.logger.info({
      msg: 'users.role.updated',
      flow: 'users.update_role',
      requestId: params.requestId,
      actorId: params.actorId,
      userId: user.id,
      role: user.role,
    });

    return user;
  }
}
