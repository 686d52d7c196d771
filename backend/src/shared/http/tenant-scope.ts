/**
 * backend/src/shared/http/tenant-scope.ts
 *
 * WHY:
 * - Establishes exactly one ScopeContext frame per /api request.
 * - Handlers (and everything they await) see the request's tenant through
 *   scope.current(); nothing below the route needs the header.
 *
 * HOW TO USE:
 * - app.get('/api/x', inTenantScope(scope, controller.list.bind(controller)))
 *
 * RULES:
 * - Missing/invalid tenant id is a 400 before the handler runs.
 * - Never open an unrestricted scope here. Admin paths do that in their service.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ScopeContext, TenantId } from '../tenancy';
import { TenancyErrors } from '../tenancy';

export type ScopedHandler = (req: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

export function requireTenantScope(req: FastifyRequest): TenantId {
  const tenantId = req.requestContext.tenantId;
  if (tenantId === null) {
    throw TenancyErrors.scopeMissingOrInvalid({ requestId: req.requestContext.requestId });
  }
  return tenantId;
}

export function inTenantScope(scope: ScopeContext, handler: ScopedHandler): ScopedHandler {
  return async (req, reply) => {
    const tenantId = requireTenantScope(req);
    return scope.withScope(tenantId, () => handler(req, reply));
  };
}
