/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Multi-tenancy requires we know which tenant a request claims to act for.
 * - We also want a stable requestId for logs, debugging and tracing.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - tenantId can be null (header missing, empty, not a positive integer).
 * - This file only parses. Enforcement happens in tenant-scope.ts.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export const TENANT_HEADER = 'x-tenant-id';

export type RequestContext = {
  requestId: string;
  tenantId: number | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

/**
 * Accepts a single header value made of digits only ("7", not "7.0", "+7" or "0x7").
 * Repeated headers arrive as an array and are rejected.
 */
export function parseTenantId(raw: unknown): number | null {
  if (typeof raw !== 'string') return null;

  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: randomUUID(),
      tenantId: parseTenantId(req.headers[TENANT_HEADER]),
    };

    done();
  });
}
