/**
 * backend/src/modules/employees/dal/employee.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for employees.
 * - The employee filter reaches organizations.tenant_id through an exists()
 *   subquery, so queries here must select from the unaliased "employees" table.
 */

import type { RawBuilder, Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { EmployeesTable } from '../../../shared/db/schema';

export type EmployeeRow = Selectable<EmployeesTable>;

export async function selectVisibleEmployeesSql(
  db: DbExecutor,
  visible: RawBuilder<boolean>,
): Promise<EmployeeRow[]> {
  return db.selectFrom('employees').selectAll().where(visible).orderBy('id').execute();
}

export async function selectVisibleEmployeeByIdSql(
  db: DbExecutor,
  visible: RawBuilder<boolean>,
  employeeId: number,
): Promise<EmployeeRow | undefined> {
  return db
    .selectFrom('employees')
    .selectAll()
    .where('id', '=', employeeId)
    .where(visible)
    .executeTakeFirst();
}
