/**
 * src/shared/db/migrations/0001_tenancy_schema.ts
 *
 * WHY:
 * - One shared schema for every tenant: tenants -> organizations -> employees.
 * - Row visibility is decided by filters at query time, so every table carries
 *   is_deleted and the ownership columns the filters read.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace @row-scope/backend
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  // ---- tenants ----
  await db.schema
    .createTable('tenants')
    .addColumn('id', 'integer', (col) => col.primaryKey().generatedByDefaultAsIdentity())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('is_deleted', 'boolean', (col) => col.notNull().defaultTo(false))
    .execute();

  // ---- organizations (tenant_id is the tenant discriminator) ----
  await db.schema
    .createTable('organizations')
    .addColumn('id', 'integer', (col) => col.primaryKey().generatedByDefaultAsIdentity())
    .addColumn('tenant_id', 'integer', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('is_deleted', 'boolean', (col) => col.notNull().defaultTo(false))
    .execute();

  // ---- employees (tenant reached through organization_id) ----
  await db.schema
    .createTable('employees')
    .addColumn('id', 'integer', (col) => col.primaryKey().generatedByDefaultAsIdentity())
    .addColumn('organization_id', 'integer', (col) =>
      col.notNull().references('organizations.id').onDelete('cascade'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('code', 'text', (col) => col.notNull())
    .addColumn('is_deleted', 'boolean', (col) => col.notNull().defaultTo(false))
    .execute();

  // The tenant filter on organizations and the exists() hop from employees both hit these.
  await sql`CREATE INDEX organizations_tenant_id_idx ON organizations(tenant_id);`.execute(db);
  await sql`CREATE INDEX employees_organization_id_idx ON employees(organization_id);`.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('employees').ifExists().execute();
  await db.schema.dropTable('organizations').ifExists().execute();
  await db.schema.dropTable('tenants').ifExists().execute();
}
