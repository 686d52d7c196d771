import type { RawBuilder, Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { TenantsTable } from '../../../shared/db/schema';

/**
 * DAL READS ONLY
 * - `visible` is the tenant entity's effective filter compiled for alias "tenants".
 * - No AppError
 * - No policies
 */
export type TenantRow = Selectable<TenantsTable>;

export async function selectVisibleTenantsSql(
  db: DbExecutor,
  visible: RawBuilder<boolean>,
): Promise<TenantRow[]> {
  return db.selectFrom('tenants').selectAll().where(visible).orderBy('id').execute();
}

export async function selectVisibleTenantByIdSql(
  db: DbExecutor,
  visible: RawBuilder<boolean>,
  tenantId: number,
): Promise<TenantRow | undefined> {
  return db
    .selectFrom('tenants')
    .selectAll()
    .where('id', '=', tenantId)
    .where(visible)
    .executeTakeFirst();
}
