/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Every request gets a stable requestId for logs and error reports.
 * - An incoming `x-request-id` header is honoured so upstream proxies can correlate.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  ip: string;
  userAgent: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

function resolveRequestId(raw: unknown): string {
  if (typeof raw === 'string' && REQUEST_ID_PATTERN.test(raw)) return raw;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = resolveRequestId(req.headers['x-request-id']);

    req.requestContext = {
      requestId,
      ip: req.ip,
      userAgent: req.headers['user-agent'] ?? null,
    };

    reply.header('x-request-id', requestId);
    done();
  });
}
