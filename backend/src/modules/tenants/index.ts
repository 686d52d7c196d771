/**
 * backend/src/modules/tenants/index.ts
 *
 * WHY:
 * - Define the public surface of the tenants module.
 * - Prevent cross-module coupling via deep imports into /dal.
 *
 * RULES:
 * - Only export stable, read-only contracts needed by other modules.
 */

export { createTenantModule, type TenantModule } from './tenant.module';
export type { NewTenant, Tenant } from './tenant.types';
