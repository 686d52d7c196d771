/**
 * backend/src/modules/employees/employee.controller.ts
 *
 * RULES:
 * - No DB access here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import {
  createEmployeeSchema,
  employeeIdParamsSchema,
  tenantIdParamsSchema,
} from './employee.schemas';
import type { EmployeeService } from './employee.service';

export class EmployeeController {
  constructor(private readonly employeeService: EmployeeService) {}

  async listEmployees(_req: FastifyRequest, reply: FastifyReply) {
    const employees = await this.employeeService.listEmployees();
    return reply.status(200).send({ employees });
  }

  async listEmployeesForTenant(req: FastifyRequest, reply: FastifyReply) {
    const parsed = tenantIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid tenant id', {
        issues: parsed.error.issues,
      });
    }

    const employees = await this.employeeService.listEmployeesForTenant(parsed.data.tenantId);
    return reply.status(200).send({ employees });
  }

  async createEmployee(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createEmployeeSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const employee = await this.employeeService.createEmployee(parsed.data);
    return reply.status(201).send({ employee });
  }

  async deleteEmployee(req: FastifyRequest, reply: FastifyReply) {
    const parsed = employeeIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid employee id', {
        issues: parsed.error.issues,
      });
    }

    await this.employeeService.deleteEmployee(parsed.data.id);
    return reply.status(204).send();
  }
}
