/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health), outside any tenant scope
 *   - module routes under /api, each wrapped in the request's tenant scope
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      storeDriver: opts.config.storeDriver,
      requestId: req.requestContext.requestId,
      tenantId: req.requestContext.tenantId,
    };
  });

  // Module routes
  opts.deps.tenants.registerRoutes(app);
  opts.deps.organizations.registerRoutes(app);
  opts.deps.employees.registerRoutes(app);
}
