/**
 * backend/src/modules/organizations/dal/organization.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for organizations.
 * - Callers pass the organization entity's effective filter (alias "organizations");
 *   these functions never decide visibility themselves.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { RawBuilder, Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { OrganizationsTable } from '../../../shared/db/schema';

export type OrganizationRow = Selectable<OrganizationsTable>;

export async function selectVisibleOrganizationsSql(
  db: DbExecutor,
  visible: RawBuilder<boolean>,
): Promise<OrganizationRow[]> {
  return db.selectFrom('organizations').selectAll().where(visible).orderBy('id').execute();
}

export async function selectVisibleOrganizationByIdSql(
  db: DbExecutor,
  visible: RawBuilder<boolean>,
  organizationId: number,
): Promise<OrganizationRow | undefined> {
  return db
    .selectFrom('organizations')
    .selectAll()
    .where('id', '=', organizationId)
    .where(visible)
    .executeTakeFirst();
}
