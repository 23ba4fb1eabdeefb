/**
 * backend/src/modules/users/user.controller.ts
 *
 * Maps /api/users HTTP calls to UserService. Identity comes from AuthGuard via
 * requireIdentity(); role gates are declared on the routes.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireIdentity } from '../../shared/http/require-auth-context';
import {
  listUsersQuerySchema,
  updateNameSchema,
  updatePasswordSchema,
  updateRoleSchema,
} from './user.schemas';
import type { UserService } from './user.service';
import { toPublicUser } from './user.types';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async getMe(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);
    const user = await this.userService.getMe(identity.userId);
    return reply.status(200).send({ user: toPublicUser(user) });
  }

  async listUsers(req: FastifyRequest, reply: FastifyReply) {
    const parsed = listUsersQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query parameters', {
        issues: parsed.error.issues,
      });
    }

    const { users, total } = await this.userService.listUsers(parsed.data);
    reply.header('x-total-count', String(total));
    return reply.status(200).send(users.map(toPublicUser));
  }

  async updateName(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);

    const parsed = updateNameSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const user = await this.userService.updateName({
      userId: identity.userId,
      name: parsed.data.name,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ user: toPublicUser(user) });
  }

  async updatePassword(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);

    const parsed = updatePasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        // issue messages only; the raw input contains passwords
        issues: parsed.error.issues.map((i) => ({ path: i.path, message: i.message })),
      });
    }

    const user = await this.userService.updatePassword({
      userId: identity.userId,
      oldPassword: parsed.data.oldPassword,
      newPassword: parsed.data.newPassword,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ user: toPublicUser(user) });
  }

  async updateRole(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);

    const parsed = updateRoleSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const user = await this.userService.updateRole({
      actorId: identity.userId,
      userId: parsed.data.userId,
      role: parsed.data.role,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ user: toPublicUser(user) });
  }
}
