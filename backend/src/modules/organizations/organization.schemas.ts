/**
 * backend/src/modules/organizations/organization.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Organizations module.
 * - Prevents invalid payloads from reaching services.
 */

import { z } from 'zod';

export const createOrganizationSchema = z.object({
  tenantId: z.number().int().positive(),
  name: z.string().trim().min(1).max(200),
});

export type CreateOrganizationInput = z.infer<typeof createOrganizationSchema>;

export const organizationIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});
