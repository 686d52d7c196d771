/**
 * backend/src/modules/organizations/organization.module.ts
 *
 * WHY:
 * - Encapsulates Organizations module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { ScopeContext } from '../../shared/tenancy';
import type { EntityStore } from '../_shared/entity-store';

import { OrganizationController } from './organization.controller';
import { registerOrganizationRoutes } from './organization.routes';
import { OrganizationService } from './organization.service';

export type OrganizationModule = ReturnType<typeof createOrganizationModule>;

export function createOrganizationModule(deps: {
  store: EntityStore;
  scope: ScopeContext;
  logger: Logger;
}) {
  const organizationService = new OrganizationService(deps);
  const controller = new OrganizationController(organizationService);

  return {
    organizationService,
    registerRoutes(app: FastifyInstance) {
      registerOrganizationRoutes(app, deps.scope, controller);
    },
  };
}
