/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for register / login / logout.
 * - Sets the HttpOnly token cookie on login, clears it on logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import {
  clearTokenCookie,
  extractAccessToken,
  setTokenCookie,
} from '../../shared/http/access-token';
import { toPublicUser } from '../users/user.types';
import { loginSchema, registerSchema } from './auth.schemas';
import type { AuthService } from './auth.service';
import type { LoginResponse } from './auth.types';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly isProduction: boolean,
  ) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const user = await this.authService.register({
      email: parsed.data.email,
      password: parsed.data.password,
      name: parsed.data.name,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(toPublicUser(user));
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.login({
      email: parsed.data.email,
      password: parsed.data.password,
      requestId: req.requestContext.requestId,
    });

    setTokenCookie(reply, result.token, result.ttlSeconds, this.isProduction);

    const body: LoginResponse = { token: result.token };
    return reply.status(200).send(body);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    await this.authService.logout({
      token: extractAccessToken(req),
      requestId: req.requestContext.requestId,
    });

    clearTokenCookie(reply, this.isProduction);
    return reply.status(204).send();
  }
}
