/**
 * backend/src/modules/employees/employee.service.ts
 *
 * WHY:
 * - Employee use cases on top of the scoped EntityStore.
 * - Employees have no tenant column; the store's employee filter hops through
 *   the organization. This service never joins by hand.
 *
 * RULES:
 * - createEmployee validates the organization BEFORE inserting.
 * - listEmployeesForTenant narrows the scope; it never widens it. The target
 *   tenant must itself be visible in the caller's scope first.
 */

import type { Logger } from '../../shared/logger/logger';
import { requireVisibleParent, type ScopeContext, type TenantId } from '../../shared/tenancy';
import type { EntityStore } from '../_shared/entity-store';
import { EmployeeErrors } from './employee.errors';
import type { Employee, NewEmployee } from './employee.types';

export class EmployeeService {
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

  async listEmployees(): Promise<Employee[]> {
    this.log('employees.list');
    return this.deps.store.employee.list();
  }

  async listEmployeesForTenant(tenantId: TenantId): Promise<Employee[]> {
    this.log('employees.list_for_tenant', { tenantId });

    await requireVisibleParent(this.deps.store.tenant, { entity: 'Tenant', id: tenantId });

    return this.deps.scope.withScope(tenantId, () => {
      this.log('employees.list_for_tenant.scoped');
      return this.deps.store.employee.list();
    });
  }

  async createEmployee(input: NewEmployee): Promise<Employee> {
    this.log('employees.create.start', { organizationId: input.organizationId });

    await requireVisibleParent(this.deps.store.organization, {
      entity: 'Organization',
      id: input.organizationId,
    });

    const employee = await this.deps.store.employee.insert({
      organizationId: input.organizationId,
      name: input.name,
      code: input.code,
    });

    this.log('employees.create.success', { employeeId: employee.id });
    return employee;
  }

  async deleteEmployee(employeeId: number): Promise<void> {
    this.log('employees.delete', { employeeId });

    const deleted = await this.deps.store.employee.softDelete(employeeId);
    if (!deleted) {
      throw EmployeeErrors.employeeNotFound({ employeeId });
    }
  }
}
