/**
 * backend/src/modules/organizations/organization.types.ts
 *
 * WHY:
 * - An Organization belongs to exactly one Tenant (tenantId is the direct
 *   tenant discriminator used by the tenant filter).
 *
 * RULES:
 * - tenantId is immutable once set (no update path exists).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type Organization = {
  id: number;
  tenantId: number;
  name: string;
  isDeleted: boolean;
};

export type NewOrganization = {
  tenantId: number;
  name: string;
};
