/**
 * backend/src/modules/employees/employee.types.ts
 *
 * WHY:
 * - An Employee belongs to one Organization and, through it, to one Tenant.
 * - There is no tenantId column: visibility follows organizationId one hop up.
 */

export type Employee = {
  id: number;
  organizationId: number;
  name: string;
  code: string;
  isDeleted: boolean;
};

export type NewEmployee = {
  organizationId: number;
  name: string;
  code: string;
};
