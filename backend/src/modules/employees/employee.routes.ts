/**
 * backend/src/modules/employees/employee.routes.ts
 *
 * WHY:
 * - Employees live under /api/organizations/employees (they are reached
 *   through their organization) plus a per-tenant listing.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import { inTenantScope } from '../../shared/http/tenant-scope';
import type { ScopeContext } from '../../shared/tenancy';
import type { EmployeeController } from './employee.controller';

export function registerEmployeeRoutes(
  app: FastifyInstance,
  scope: ScopeContext,
  controller: EmployeeController,
) {
  app.get(
    '/api/organizations/employees',
    inTenantScope(scope, controller.listEmployees.bind(controller)),
  );
  app.post(
    '/api/organizations/employees',
    inTenantScope(scope, controller.createEmployee.bind(controller)),
  );
  app.delete(
    '/api/organizations/employees/:id',
    inTenantScope(scope, controller.deleteEmployee.bind(controller)),
  );
  app.get(
    '/api/tenants/:tenantId/employees',
    inTenantScope(scope, controller.listEmployeesForTenant.bind(controller)),
  );
}
