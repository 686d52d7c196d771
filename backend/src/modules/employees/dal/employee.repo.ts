/**
 * backend/src/modules/employees/dal/employee.repo.ts
 *
 * WHY:
 * - Postgres implementation of EntityTable<Employee>.
 *
 * RULES:
 * - No AppError.
 * - No policies. Organization visibility is checked by the service before insert.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { EntityTable } from '../../../shared/store/entity-table';
import type { EntityFilters } from '../../_shared/entity-model';
import type { Employee, NewEmployee } from '../employee.types';
import {
  selectVisibleEmployeeByIdSql,
  selectVisibleEmployeesSql,
  type EmployeeRow,
} from './employee.query-sql';

export function toEmployee(row: EmployeeRow): Employee {
  return {
    id: row.id,
    organizationId: row.organization_id,
    name: row.name,
    code: row.code,
    isDeleted: Boolean(row.is_deleted),
  };
}

export class EmployeeRepo implements EntityTable<Employee, NewEmployee> {
  constructor(
    private readonly db: DbExecutor,
    private readonly filters: EntityFilters,
  ) {}

  private visible() {
    return this.filters.effectivePredicate('employee').toSql('employees');
  }

  async list(): Promise<Employee[]> {
    const rows = await selectVisibleEmployeesSql(this.db, this.visible());
    return rows.map(toEmployee);
  }

  async findById(id: number): Promise<Employee | undefined> {
    const row = await selectVisibleEmployeeByIdSql(this.db, this.visible(), id);
    return row ? toEmployee(row) : undefined;
  }

  async exists(id: number): Promise<boolean> {
    const row = await selectVisibleEmployeeByIdSql(this.db, this.visible(), id);
    return row !== undefined;
  }

  async insert(values: NewEmployee): Promise<Employee> {
    const row = await this.db
      .insertInto('employees')
      .values({
        organization_id: values.organizationId,
        name: values.name,
        code: values.code,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toEmployee(row);
  }

  async softDelete(id: number): Promise<boolean> {
    const res = await this.db
      .updateTable('employees')
      .set({ is_deleted: true })
      .where('id', '=', id)
      .where(this.visible())
      .executeTakeFirst();

    return Number(res.numUpdatedRows) > 0;
  }
}
