/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts
 * - Global request context is attached here (requestId + claimed tenant id).
 * - Module routes are registered afterwards via app/routes.ts.
 */

import Fastify from 'fastify';

import { withRequestContext } from '../shared/logger/with-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerRequestContext } from '../shared/http/request-context';

export async function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  // Basic request logging (includes requestId + tenantId)
  app.addHook('onResponse', async (req, reply) => {
    withRequestContext(req).info('request', {
      flow: 'http.request',
      status: reply.statusCode,
    });
  });

  return app;
}
