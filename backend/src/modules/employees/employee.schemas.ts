/**
 * backend/src/modules/employees/employee.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Employees module.
 */

import { z } from 'zod';

export const createEmployeeSchema = z.object({
  organizationId: z.number().int().positive(),
  name: z.string().trim().min(1).max(200),
  code: z.string().trim().min(1).max(50),
});

export type CreateEmployeeInput = z.infer<typeof createEmployeeSchema>;

export const employeeIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const tenantIdParamsSchema = z.object({
  tenantId: z.coerce.number().int().positive(),
});
