/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Every failure must leave the process as `{ code, message }`.
 * - Internal details (meta, causes, stack traces) must never reach clients.
 *
 * RESPONSIBILITIES:
 * - AppError → its .status and .code.
 * - ZodError → 400 (safety net if a controller forgets safeParse).
 * - Fastify client errors keep their status (bad JSON 400, oversized body 413,
 *   unsupported content type 415).
 * - HashingError / PersistenceError / anything else → 500 with a generic message.
 * - Log every error with request context.
 *
 * RULES:
 * - No business logic here.
 * - Meta is redacted before logging; it is never sent.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { AppError } from './errors';
import type { AppErrorCode } from './errors';
import { withRequestContext } from '../logger/with-context';
import { HashingError } from '../security/password-hasher';
import { PersistenceError } from '../db/persistence-error';

export type ErrorResponseBody = {
  code: string;
  message: string;
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'password',
  'oldPassword',
  'newPassword',
  'newPasswordConfirm',
  'passwordHash',
  'secret',
  'authorization',
  'cookie',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { code, message };
}

const CLIENT_ERROR_BODIES: Readonly<Record<number, { code: AppErrorCode; message: string }>> = {
  413: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' },
  415: { code: 'UNSUPPORTED_MEDIA_TYPE', message: 'Unsupported media type' },
};

function clientErrorBody(status: number): ErrorResponseBody {
  const known = CLIENT_ERROR_BODIES[status];
  return known
    ? buildResponse(known.code, known.message)
    : buildResponse('VALIDATION_ERROR', 'Invalid request');
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Validation that slipped past a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 3) Fastify-level client errors (bad JSON, unsupported media type, ...)
    if (typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
      log.warn('client_error', {
        flow: 'http.error',
        fastifyCode: err.code,
        status: err.statusCode,
        message: err.message,
      });
      return reply.status(err.statusCode).send(clientErrorBody(err.statusCode));
    }

    // 4) Infrastructure failures: full detail in logs, generic body to the client
    if (err instanceof HashingError || err instanceof PersistenceError) {
      log.error('infra_error', {
        flow: 'http.error',
        kind: err.name,
        message: err.message,
        cause: err.cause instanceof Error ? err.cause.message : undefined,
        stack: err.stack,
      });

      return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
    }

    // 5) Unexpected errors
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req, reply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.error' });
    return reply.status(404).send(buildResponse('NOT_FOUND', 'Route not found'));
  });
}
