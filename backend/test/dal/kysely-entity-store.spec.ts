import { describe, it, expect } from 'vitest';

import { ScopeContext } from '../../src/shared/tenancy';
import { buildEntityFilters } from '../../src/modules/_shared/entity-model';
import { createKyselyEntityStore } from '../../src/modules/_shared/entity-store';
import { createColdKysely } from '../helpers/cold-kysely';

const ORG_VISIBLE = '("organizations"."is_deleted" = false) and ("organizations"."tenant_id" = $1)';

function setup() {
  const { db, queries } = createColdKysely();
  const scope = new ScopeContext();
  const store = createKyselyEntityStore(db, buildEntityFilters(scope));
  return { db, queries, scope, store };
}

describe('Kysely entity store', () => {
  it('appends the organization filter to every listing', async () => {
    const { queries, scope, store } = setup();

    await scope.withScope(1, () => store.organization.list());

    expect(queries).toHaveLength(1);
    expect(queries[0]?.sql).toBe(
      `select * from "organizations" where ${ORG_VISIBLE} order by "id"`,
    );
    expect(queries[0]?.parameters).toEqual([1]);
  });

  it('reaches the employee tenant through an exists() subquery', async () => {
    const { queries, scope, store } = setup();

    await scope.withScope(3, () => store.employee.list());

    expect(queries[0]?.sql).toBe(
      'select * from "employees" where ("employees"."is_deleted" = false) and (exists (select 1 from "organizations" as "scope_parent" where "scope_parent"."id" = "employees"."organization_id" and "scope_parent"."is_deleted" = false and "scope_parent"."tenant_id" = $1)) order by "id"',
    );
    expect(queries[0]?.parameters).toEqual([3]);
  });

  it('drops only the tenant part in the unrestricted scope', async () => {
    const { queries, store } = setup();

    await store.tenant.list();

    expect(queries[0]?.sql).toBe(
      'select * from "tenants" where ("tenants"."is_deleted" = false) and (true) order by "id"',
    );
    expect(queries[0]?.parameters).toEqual([]);
  });

  it('reads the scope per query, not per store', async () => {
    const { queries, scope, store } = setup();

    await scope.withScope(1, () => store.organization.list());
    await scope.withScope(2, () => store.organization.list());

    expect(queries.map((q) => q.parameters)).toEqual([[1], [2]]);
  });

  it('filters lookups by id', async () => {
    const { queries, scope, store } = setup();

    const found = await scope.withScope(2, () => store.organization.findById(7));
    const exists = await scope.withScope(2, () => store.organization.exists(7));

    expect(found).toBeUndefined();
    expect(exists).toBe(false);
    expect(queries[0]?.sql).toBe(
      'select * from "organizations" where "id" = $1 and ("organizations"."is_deleted" = false) and ("organizations"."tenant_id" = $2)',
    );
    expect(queries[0]?.parameters).toEqual([7, 2]);
  });

  it('guards the soft-delete update with the same filter', async () => {
    const { queries, scope, store } = setup();

    const deleted = await scope.withScope(1, () => store.organization.softDelete(5));

    expect(deleted).toBe(false);
    expect(queries[0]?.sql).toBe(
      'update "organizations" set "is_deleted" = $1 where "id" = $2 and ("organizations"."is_deleted" = false) and ("organizations"."tenant_id" = $3)',
    );
    expect(queries[0]?.parameters).toEqual([true, 5, 1]);
  });
});
