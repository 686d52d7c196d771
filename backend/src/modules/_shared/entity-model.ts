/**
 * backend/src/modules/_shared/entity-model.ts
 *
 * WHY:
 * - Single place where the model's row filters are declared, once, at startup.
 * - Every entity gets soft-delete; every entity gets a tenant filter:
 *     tenant        -> its own id
 *     organization  -> tenant_id
 *     employee      -> organization_id -> organizations.tenant_id (one hop)
 *
 * RULES:
 * - Called by the composition root only (one registry per ScopeContext).
 * - The returned registry is sealed; adding a concern means editing this file.
 */

import {
  FilterRegistry,
  softDeleteFilter,
  TenantPredicateFactory,
  type EntityTypeOf,
  type ScopeContext,
} from '../../shared/tenancy';
import type { Tenant, NewTenant } from '../tenants/tenant.types';
import type { Organization, NewOrganization } from '../organizations/organization.types';
import type { Employee, NewEmployee } from '../employees/employee.types';

export type EntityRowMap = {
  tenant: Tenant;
  organization: Organization;
  employee: Employee;
};

export type NewEntityMap = {
  tenant: NewTenant;
  organization: NewOrganization;
  employee: NewEmployee;
};

export type EntityType = EntityTypeOf<EntityRowMap>;

export type EntityFilters = FilterRegistry<EntityRowMap>;

export const ENTITY_TYPES: readonly EntityType[] = ['tenant', 'organization', 'employee'];

export const ENTITY_TABLES = {
  tenant: 'tenants',
  organization: 'organizations',
  employee: 'employees',
} as const satisfies Record<EntityType, string>;

export function declareTenantOwnership(scope: ScopeContext): TenantPredicateFactory<EntityRowMap> {
  return new TenantPredicateFactory<EntityRowMap>(scope)
    .ownedDirectly('tenant', {
      table: ENTITY_TABLES.tenant,
      column: 'id',
      tenantIdOf: (tenant) => tenant.id,
    })
    .ownedDirectly('organization', {
      table: ENTITY_TABLES.organization,
      column: 'tenant_id',
      tenantIdOf: (organization) => organization.tenantId,
    })
    .ownedViaParent('employee', {
      column: 'organization_id',
      parentType: 'organization',
      parentIdOf: (employee) => employee.organizationId,
    });
}

export function buildEntityFilters(scope: ScopeContext): EntityFilters {
  const registry = new FilterRegistry<EntityRowMap>();

  registry.registerForAll(ENTITY_TYPES, () => softDeleteFilter<EntityRowMap, EntityType>());

  const tenancy = declareTenantOwnership(scope);
  for (const entityType of tenancy.ownedTypes()) {
    registry.register(entityType, tenancy.forEntity(entityType));
  }

  registry.seal();
  return registry;
}
