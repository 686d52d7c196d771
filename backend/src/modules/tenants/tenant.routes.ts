import type { FastifyInstance } from 'fastify';
import { inTenantScope } from '../../shared/http/tenant-scope';
import type { ScopeContext } from '../../shared/tenancy';
import type { TenantController } from './tenant.controller';

export function registerTenantRoutes(
  app: FastifyInstance,
  scope: ScopeContext,
  controller: TenantController,
) {
  app.get('/api/tenants', inTenantScope(scope, controller.listTenants.bind(controller)));
}
