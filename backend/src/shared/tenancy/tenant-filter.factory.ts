/**
 * backend/src/shared/tenancy/tenant-filter.factory.ts
 *
 * WHY:
 * - Builds the "row is visible to the current tenant" filter per entity type.
 * - Some entities carry their tenant id (organizations.tenant_id), others only
 *   reach it through a parent (employees -> organizations.tenant_id).
 *   Callers ask forEntity(type) and never need to know which case applies.
 *
 * HOW TO USE:
 * - Declare ownership once at model initialization:
 *     factory
 *       .ownedDirectly('organization', { table: 'organizations', column: 'tenant_id', tenantIdOf: (o) => o.tenantId })
 *       .ownedViaParent('employee', { column: 'organization_id', parentType: 'organization', parentIdOf: (e) => e.organizationId })
 * - Register factory.forEntity(type) into the FilterRegistry.
 *
 * RULES:
 * - The filter reads scope.current() on EVERY evaluation (never at build time).
 * - scope null => true for direct ownership (administrative bypass).
 * - A child is visible only while its parent row is live (not soft-deleted),
 *   in every scope. The tenant comparison is dropped when unrestricted.
 * - Exactly one hop: a parent must itself be owned directly.
 */

import { sql } from 'kysely';

import type { ScopeContext } from './scope-context';
import type { EntityModel, EntityTypeOf, RowFilter, TenantId } from './tenancy.types';
import { FilterRegistrationError } from './tenancy.errors';

const PARENT_ALIAS = 'scope_parent';

type DirectOwnership<M extends EntityModel> = {
  kind: 'direct';
  table: string;
  column: string;
  deletedColumn: string;
  tenantIdOf(row: M[EntityTypeOf<M>]): TenantId;
};

type ParentOwnership<M extends EntityModel> = {
  kind: 'viaParent';
  column: string;
  parentType: EntityTypeOf<M>;
  parent: DirectOwnership<M>;
  parentIdOf(row: M[EntityTypeOf<M>]): number;
};

type TenantOwnership<M extends EntityModel> = DirectOwnership<M> | ParentOwnership<M>;

export class TenantPredicateFactory<M extends EntityModel> {
  private readonly ownership = new Map<EntityTypeOf<M>, TenantOwnership<M>>();

  constructor(private readonly scope: ScopeContext) {}

  ownedDirectly<K extends EntityTypeOf<M>>(
    entityType: K,
    opts: {
      table: string;
      column: string;
      deletedColumn?: string;
      tenantIdOf: (row: M[K]) => TenantId;
    },
  ): this {
    this.ownership.set(entityType, {
      kind: 'direct',
      table: opts.table,
      column: opts.column,
      deletedColumn: opts.deletedColumn ?? 'is_deleted',
      tenantIdOf: opts.tenantIdOf,
    });
    return this;
  }

  ownedViaParent<K extends EntityTypeOf<M>, P extends EntityTypeOf<M>>(
    entityType: K,
    opts: { column: string; parentType: P; parentIdOf: (row: M[K]) => number },
  ): this {
    const parent = this.ownership.get(opts.parentType);
    if (!parent || parent.kind !== 'direct') {
      throw new FilterRegistrationError(
        `'${entityType}' is owned via '${opts.parentType}', which must be owned directly and declared first.`,
        entityType,
        'tenant',
      );
    }

    this.ownership.set(entityType, {
      kind: 'viaParent',
      column: opts.column,
      parentType: opts.parentType,
      parent,
      parentIdOf: opts.parentIdOf,
    });
    return this;
  }

  ownedTypes(): EntityTypeOf<M>[] {
    return [...this.ownership.keys()];
  }

  forEntity<K extends EntityTypeOf<M>>(entityType: K): RowFilter<M, K> {
    const ownership = this.ownership.get(entityType);
    if (!ownership) {
      throw new FilterRegistrationError(
        `No tenant ownership declared for '${entityType}'.`,
        entityType,
        'tenant',
      );
    }

    return ownership.kind === 'direct'
      ? this.directFilter<K>(ownership)
      : this.parentHopFilter<K>(ownership);
  }

  private directFilter<K extends EntityTypeOf<M>>(ownership: DirectOwnership<M>): RowFilter<M, K> {
    const scope = this.scope;

    return {
      concern: 'tenant',

      matches(row) {
        const tenantId = scope.current();
        return tenantId === null || ownership.tenantIdOf(row) === tenantId;
      },

      toSql(alias) {
        const tenantId = scope.current();
        if (tenantId === null) return sql<boolean>`true`;

        return sql<boolean>`${sql.ref(`${alias}.${ownership.column}`)} = ${tenantId}`;
      },
    };
  }

  private parentHopFilter<K extends EntityTypeOf<M>>(
    ownership: ParentOwnership<M>,
  ): RowFilter<M, K> {
    const scope = this.scope;
    const parent = ownership.parent;

    return {
      concern: 'tenant',

      matches(row, lookup) {
        const parentRow = lookup.get(ownership.parentType, ownership.parentIdOf(row));
        if (parentRow === undefined || parentRow.isDeleted) return false;

        const tenantId = scope.current();
        return tenantId === null || parent.tenantIdOf(parentRow) === tenantId;
      },

      toSql(alias) {
        const tenantId = scope.current();
        const live = sql<boolean>`${sql.ref(`${PARENT_ALIAS}.id`)} = ${sql.ref(
          `${alias}.${ownership.column}`,
        )} and ${sql.ref(`${PARENT_ALIAS}.${parent.deletedColumn}`)} = false`;
        const owned =
          tenantId === null
            ? live
            : sql<boolean>`${live} and ${sql.ref(`${PARENT_ALIAS}.${parent.column}`)} = ${tenantId}`;

        return sql<boolean>`exists (select 1 from ${sql.table(parent.table)} as ${sql.id(
          PARENT_ALIAS,
        )} where ${owned})`;
      },
    };
  }
}
