/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - Mirrors migrations/0001_tenancy_schema.ts; update both together.
 *
 * RULES:
 * - snake_case here only. DAL/queries map rows to camelCase domain types.
 */

import type { Generated } from 'kysely';

export interface TenantsTable {
  id: Generated<number>;
  name: string;
  description: string | null;
  is_deleted: Generated<boolean>;
}

export interface OrganizationsTable {
  id: Generated<number>;
  tenant_id: number;
  name: string;
  is_deleted: Generated<boolean>;
}

export interface EmployeesTable {
  id: Generated<number>;
  organization_id: number;
  name: string;
  code: string;
  is_deleted: Generated<boolean>;
}

export interface DB {
  tenants: TenantsTable;
  organizations: OrganizationsTable;
  employees: EmployeesTable;
}
