/**
 * backend/src/modules/organizations/dal/organization.repo.ts
 *
 * WHY:
 * - Postgres implementation of EntityTable<Organization>.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies. Parent (tenant) visibility is checked by the service before insert.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { EntityTable } from '../../../shared/store/entity-table';
import type { EntityFilters } from '../../_shared/entity-model';
import type { NewOrganization, Organization } from '../organization.types';
import {
  selectVisibleOrganizationByIdSql,
  selectVisibleOrganizationsSql,
  type OrganizationRow,
} from './organization.query-sql';

export function toOrganization(row: OrganizationRow): Organization {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    isDeleted: Boolean(row.is_deleted),
  };
}

export class OrganizationRepo implements EntityTable<Organization, NewOrganization> {
  constructor(
    private readonly db: DbExecutor,
    private readonly filters: EntityFilters,
  ) {}

  private visible() {
    return this.filters.effectivePredicate('organization').toSql('organizations');
  }

  async list(): Promise<Organization[]> {
    const rows = await selectVisibleOrganizationsSql(this.db, this.visible());
    return rows.map(toOrganization);
  }

  async findById(id: number): Promise<Organization | undefined> {
    const row = await selectVisibleOrganizationByIdSql(this.db, this.visible(), id);
    return row ? toOrganization(row) : undefined;
  }

  async exists(id: number): Promise<boolean> {
    const row = await selectVisibleOrganizationByIdSql(this.db, this.visible(), id);
    return row !== undefined;
  }

  async insert(values: NewOrganization): Promise<Organization> {
    const row = await this.db
      .insertInto('organizations')
      .values({
        tenant_id: values.tenantId,
        name: values.name,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toOrganization(row);
  }

  /**
   * Only a row visible in the current scope can be deleted; the WHERE carries
   * the same filter as every read.
   */
  async softDelete(id: number): Promise<boolean> {
    const res = await this.db
      .updateTable('organizations')
      .set({ is_deleted: true })
      .where('id', '=', id)
      .where(this.visible())
      .executeTakeFirst();

    return Number(res.numUpdatedRows) > 0;
  }
}
