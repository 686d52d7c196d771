/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates the ScopeContext, the sealed filter registry and the store ONCE.
 * - Keeps modules testable (tests run the same graph on the in-memory store).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which store driver) belong HERE,
 *   not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { ScopeContext } from '../shared/tenancy';
import { buildEntityFilters, type EntityFilters } from '../modules/_shared/entity-model';
import {
  createInMemEntityStore,
  createKyselyEntityStore,
  type EntityStore,
} from '../modules/_shared/entity-store';

import { createTenantModule, type TenantModule } from '../modules/tenants';
import { createOrganizationModule } from '../modules/organizations/organization.module';
import type { OrganizationModule } from '../modules/organizations/organization.module';
import { createEmployeeModule } from '../modules/employees/employee.module';
import type { EmployeeModule } from '../modules/employees/employee.module';

export type AppDeps = {
  db: Db | null;
  store: EntityStore;

  scope: ScopeContext;
  filters: EntityFilters;

  logger: Logger;

  // modules
  tenants: TenantModule;
  organizations: OrganizationModule;
  employees: EmployeeModule;

  // lifecycle
  close: () => Promise<void>;
};

function buildStore(config: AppConfig, filters: EntityFilters): { db: Db | null; store: EntityStore } {
  if (config.storeDriver === 'memory') {
    return { db: null, store: createInMemEntityStore(filters) };
  }

  if (!config.databaseUrl) {
    // config.ts already rejects this combination
    throw new Error('DATABASE_URL is required when STORE_DRIVER=postgres');
  }

  const db = createDb(config.databaseUrl);
  return { db, store: createKyselyEntityStore(db, filters) };
}

export async function buildDeps(config: AppConfig): Promise<AppDeps> {
  const scope = new ScopeContext();

  // Throws FilterRegistrationError on a bad model; startup must fail.
  const filters = buildEntityFilters(scope);

  const { db, store } = buildStore(config, filters);

  logger.info('deps.ready', {
    flow: 'app.di',
    storeDriver: config.storeDriver,
  });

  // modules (no HTTP / no business logic here)
  const tenants = createTenantModule({ store, scope, logger });
  const organizations = createOrganizationModule({ store, scope, logger });
  const employees = createEmployeeModule({ store, scope, logger });

  return {
    db,
    store,
    scope,
    filters,
    logger,
    tenants,
    organizations,
    employees,
    close: async () => {
      if (db) await db.destroy();
    },
  };
}
