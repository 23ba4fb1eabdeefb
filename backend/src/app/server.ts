/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts
 * - Global request context + empty auth context are attached here;
 *   AuthGuard fills the auth context on protected routes.
 * - Module routes are registered afterwards via app/routes.ts.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerErrorHandler(app);

  app.addHook('onResponse', (req, reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      requestId: req.requestContext.requestId,
      userId: req.authContext.userId,
      env: opts.config.nodeEnv,
    });
    done();
  });

  return app;
}
