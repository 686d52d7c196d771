/**
 * backend/src/modules/organizations/organization.service.ts
 *
 * WHY:
 * - Organization use cases on top of the scoped EntityStore.
 * - Reads never filter by hand: the store applies the effective filter.
 *
 * RULES:
 * - Validate the parent tenant BEFORE inserting (visibility is authorization).
 * - listAllOrganizations is the only unrestricted path in this module.
 * - Log every operation with the active scope.
 */

import type { Logger } from '../../shared/logger/logger';
import { requireVisibleParent, type ScopeContext } from '../../shared/tenancy';
import type { EntityStore } from '../_shared/entity-store';
import { OrganizationErrors } from './organization.errors';
import type { NewOrganization, Organization } from './organization.types';

export class OrganizationService {
  constructor(
    private readonly deps: {
      store: EntityStore;
      scope: ScopeContext;
      logger: Logger;
    },
  ) {}

  private log(flow: string, meta: Record<string, unknown> = {}) {
    this.deps.logger.info({
      msg: flow,
      flow,
      scopeTenantId: this.deps.scope.current(),
      ...meta,
    });
  }

  async listOrganizations(): Promise<Organization[]> {
    this.log('organizations.list');
    return this.deps.store.organization.list();
  }

  /**
   * Administrative listing across every tenant. Soft-deleted rows stay hidden;
   * only the tenant filter is lifted.
   */
  async listAllOrganizations(): Promise<Organization[]> {
    this.log('organizations.list_all');
    return this.deps.scope.withScope(null, () => this.deps.store.organization.list());
  }

  async createOrganization(input: NewOrganization): Promise<Organization> {
    this.log('organizations.create.start', { tenantId: input.tenantId });

    await requireVisibleParent(this.deps.store.tenant, { entity: 'Tenant', id: input.tenantId });

    const organization = await this.deps.store.organization.insert({
      tenantId: input.tenantId,
      name: input.name,
    });

    this.log('organizations.create.success', { organizationId: organization.id });
    return organization;
  }

  async deleteOrganization(organizationId: number): Promise<void> {
    this.log('organizations.delete', { organizationId });

    const deleted = await this.deps.store.organization.softDelete(organizationId);
    if (!deleted) {
      throw OrganizationErrors.organizationNotFound({ organizationId });
    }
  }
}
