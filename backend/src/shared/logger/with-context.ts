/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Request logs should carry requestId + the resolved identity so a full
 *   request can be traced without each handler repeating the fields.
 *
 * HOW TO USE:
 * - `withRequestContext(req).info('auth.logout.success', { flow: 'auth.logout' })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export type RequestLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withRequestContext(req: FastifyRequest): RequestLogger {
  const base = {
    requestId: req.requestContext?.requestId,
    method: req.method,
    url: req.url,

    userId: req.authContext?.userId ?? null,
    role: req.authContext?.role ?? null,
  };

  return {
    info: (msg, meta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
