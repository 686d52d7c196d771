/**
 * backend/src/modules/tenants/tenant.module.ts
 *
 * WHY:
 * - Encapsulates Tenants module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { ScopeContext } from '../../shared/tenancy';
import type { EntityStore } from '../_shared/entity-store';

import { TenantController } from './tenant.controller';
import { registerTenantRoutes } from './tenant.routes';
import { TenantService } from './tenant.service';

export type TenantModule = ReturnType<typeof createTenantModule>;

export function createTenantModule(deps: {
  store: EntityStore;
  scope: ScopeContext;
  logger: Logger;
}) {
  const tenantService = new TenantService(deps);
  const controller = new TenantController(tenantService);

  return {
    tenantService,
    registerRoutes(app: FastifyInstance) {
      registerTenantRoutes(app, deps.scope, controller);
    },
  };
}
