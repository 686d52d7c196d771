/**
 * backend/src/modules/tenants/dal/tenant.repo.ts
 *
 * WHY:
 * - Postgres implementation of EntityTable<Tenant>.
 * - Reads (and the soft-delete target) always carry the tenant entity filter.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { EntityTable } from '../../../shared/store/entity-table';
import type { EntityFilters } from '../../_shared/entity-model';
import type { NewTenant, Tenant } from '../tenant.types';
import { selectVisibleTenantByIdSql, selectVisibleTenantsSql } from './tenant.query-sql';
import type { TenantRow } from './tenant.query-sql';

export function toTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    isDeleted: Boolean(row.is_deleted),
  };
}

export class TenantRepo implements EntityTable<Tenant, NewTenant> {
  constructor(
    private readonly db: DbExecutor,
    private readonly filters: EntityFilters,
  ) {}

  private visible() {
    return this.filters.effectivePredicate('tenant').toSql('tenants');
  }

  async list(): Promise<Tenant[]> {
    const rows = await selectVisibleTenantsSql(this.db, this.visible());
    return rows.map(toTenant);
  }

  async findById(id: number): Promise<Tenant | undefined> {
    const row = await selectVisibleTenantByIdSql(this.db, this.visible(), id);
    return row ? toTenant(row) : undefined;
  }

  async exists(id: number): Promise<boolean> {
    const row = await selectVisibleTenantByIdSql(this.db, this.visible(), id);
    return row !== undefined;
  }

  async insert(values: NewTenant): Promise<Tenant> {
    const row = await this.db
      .insertInto('tenants')
      .values({
        name: values.name,
        description: values.description ?? null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toTenant(row);
  }

  async softDelete(id: number): Promise<boolean> {
    const res = await this.db
      .updateTable('tenants')
      .set({ is_deleted: true })
      .where('id', '=', id)
      .where(this.visible())
      .executeTakeFirst();

    return Number(res.numUpdatedRows) > 0;
  }
}
