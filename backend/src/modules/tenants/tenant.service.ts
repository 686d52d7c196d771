import type { Logger } from '../../shared/logger/logger';
import type { ScopeContext } from '../../shared/tenancy';
import type { EntityStore } from '../_shared/entity-store';
import type { Tenant } from './tenant.types';

/**
 * Read-only: tenants are provisioned by the seed or by direct DB work.
 * Under a tenant scope the list holds at most the caller's own tenant.
 */
export class TenantService {
  constructor(
    private readonly deps: {
      store: EntityStore;
      scope: ScopeContext;
      logger: Logger;
    },
  ) {}

  async listTenants(): Promise<Tenant[]> {
    this.deps.logger.info({
      msg: 'tenants.list',
      flow: 'tenants.list',
      scopeTenantId: this.deps.scope.current(),
    });

    return this.deps.store.tenant.list();
  }
}
