import { AppError, type AppErrorMeta } from '../../shared/http/errors';

/**
 * Employees are scoped through their organization; an employee of another
 * tenant's organization is NOT_FOUND, never forbidden.
 */
export const EmployeeErrors = {
  employeeNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Employee not found.', meta);
  },
} as const;
