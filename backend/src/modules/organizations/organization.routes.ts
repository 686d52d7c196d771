/**
 * backend/src/modules/organizations/organization.routes.ts
 *
 * WHY:
 * - Declares Organizations module endpoints.
 * - Every endpoint runs inside the request's tenant scope.
 *
 * RULES:
 * - No business logic here.
 * - "/all" lifts the tenant filter inside the service, not here.
 */

import type { FastifyInstance } from 'fastify';
import { inTenantScope } from '../../shared/http/tenant-scope';
import type { ScopeContext } from '../../shared/tenancy';
import type { OrganizationController } from './organization.controller';

export function registerOrganizationRoutes(
  app: FastifyInstance,
  scope: ScopeContext,
  controller: OrganizationController,
) {
  app.get(
    '/api/organizations',
    inTenantScope(scope, controller.listOrganizations.bind(controller)),
  );
  app.get(
    '/api/organizations/all',
    inTenantScope(scope, controller.listAllOrganizations.bind(controller)),
  );
  app.post(
    '/api/organizations',
    inTenantScope(scope, controller.createOrganization.bind(controller)),
  );
  app.delete(
    '/api/organizations/:id',
    inTenantScope(scope, controller.deleteOrganization.bind(controller)),
  );
}
