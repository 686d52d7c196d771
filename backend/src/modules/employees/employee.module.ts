/**
 * backend/src/modules/employees/employee.module.ts
 *
 * WHY:
 * - Encapsulates Employees module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { ScopeContext } from '../../shared/tenancy';
import type { EntityStore } from '../_shared/entity-store';

import { EmployeeController } from './employee.controller';
import { registerEmployeeRoutes } from './employee.routes';
import { EmployeeService } from './employee.service';

export type EmployeeModule = ReturnType<typeof createEmployeeModule>;

export function createEmployeeModule(deps: {
  store: EntityStore;
  scope: ScopeContext;
  logger: Logger;
}) {
  const employeeService = new EmployeeService(deps);
  const controller = new EmployeeController(employeeService);

  return {
    employeeService,
    registerRoutes(app: FastifyInstance) {
      registerEmployeeRoutes(app, deps.scope, controller);
    },
  };
}
