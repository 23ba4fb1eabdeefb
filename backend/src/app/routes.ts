/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/api/healthchecker)
 *   - module routes (auth, users)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Liveness probe; no DB or Redis round-trip.
  app.get('/api/healthchecker', (req) => {
    return {
      status: 'success',
      message: `${opts.config.serviceName} is up`,
      requestId: req.requestContext.requestId,
    };
  });

  opts.deps.auth.registerRoutes(app);
  opts.deps.users.registerRoutes(app);
}
