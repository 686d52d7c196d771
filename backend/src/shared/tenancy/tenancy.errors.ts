/**
 * backend/src/shared/tenancy/tenancy.errors.ts
 *
 * WHY:
 * - Tenancy core owns two failure classes:
 *   - request time: missing scope, invisible parent (AppError, mapped to HTTP)
 *   - startup time: conflicting filter registration (plain Error, fatal)
 *
 * SECURITY:
 * - A parent owned by another tenant is reported exactly like a missing one.
 *   Never add a "forbidden" variant here; it would confirm the row exists.
 */

import { AppError, type AppErrorMeta } from '../http/errors';

export const TenancyErrors = {
  scopeMissingOrInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('Tenant scope is missing or invalid.', meta);
  },

  parentNotVisible(entity: string, meta?: AppErrorMeta) {
    return AppError.notFound(`${entity} not found.`, meta);
  },
} as const;

/**
 * Thrown while the entity model is being initialized (duplicate concern for one
 * entity type, or registration after the registry was sealed).
 * Programmer error: the process should fail to start.
 */
export class FilterRegistrationError extends Error {
  constructor(
    message: string,
    readonly entityType: string,
    readonly concern: string,
  ) {
    super(message);
    this.name = 'FilterRegistrationError';
  }
}
