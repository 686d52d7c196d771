/**
 * backend/src/modules/organizations/organization.errors.ts
 *
 * WHY:
 * - Organizations module owns its domain semantics.
 *
 * SECURITY:
 * - An organization owned by another tenant is reported as NOT_FOUND,
 *   identical to one that never existed.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const OrganizationErrors = {
  organizationNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Organization not found.', meta);
  },
} as const;
