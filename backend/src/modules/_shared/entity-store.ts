/**
 * backend/src/modules/_shared/entity-store.ts
 *
 * WHY:
 * - One EntityTable per entity type, behind the same interface for both drivers.
 * - Services depend on EntityStore only; they never see Kysely or Maps.
 *
 * RULES:
 * - Both drivers read through the same sealed EntityFilters.
 * - Inserts are NOT filtered; services validate parents first.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { EntityTable } from '../../shared/store/entity-table';
import { InMemRowSet, InMemTable } from '../../shared/store/inmem-entity-store';
import { EmployeeRepo } from '../employees/dal/employee.repo';
import type { NewEmployee } from '../employees/employee.types';
import { OrganizationRepo } from '../organizations/dal/organization.repo';
import type { NewOrganization } from '../organizations/organization.types';
import { TenantRepo } from '../tenants/dal/tenant.repo';
import type { NewTenant } from '../tenants/tenant.types';
import type { EntityFilters, EntityRowMap, EntityType, NewEntityMap } from './entity-model';

export type EntityStore = {
  [K in EntityType]: EntityTable<EntityRowMap[K], NewEntityMap[K]>;
};

export function createKyselyEntityStore(db: DbExecutor, filters: EntityFilters): EntityStore {
  return {
    tenant: new TenantRepo(db, filters),
    organization: new OrganizationRepo(db, filters),
    employee: new EmployeeRepo(db, filters),
  };
}

export function createInMemEntityStore(filters: EntityFilters): EntityStore {
  const rows = new InMemRowSet<EntityRowMap>({
    tenant: new Map(),
    organization: new Map(),
    employee: new Map(),
  });

  return {
    tenant: new InMemTable<EntityRowMap, 'tenant', NewTenant>({
      entityType: 'tenant',
      rows,
      filters,
      build: (id, values) => ({
        id,
        name: values.name,
        description: values.description ?? null,
        isDeleted: false,
      }),
    }),
    organization: new InMemTable<EntityRowMap, 'organization', NewOrganization>({
      entityType: 'organization',
      rows,
      filters,
      build: (id, values) => ({
        id,
        tenantId: values.tenantId,
        name: values.name,
        isDeleted: false,
      }),
    }),
    employee: new InMemTable<EntityRowMap, 'employee', NewEmployee>({
      entityType: 'employee',
      rows,
      filters,
      build: (id, values) => ({
        id,
        organizationId: values.organizationId,
        name: values.name,
        code: values.code,
        isDeleted: false,
      }),
    }),
  };
}
