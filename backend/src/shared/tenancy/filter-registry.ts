/**
 * backend/src/shared/tenancy/filter-registry.ts
 *
 * WHY:
 * - Several independent concerns (soft-delete, tenant scope, ...) each restrict
 *   what rows of an entity type are visible. None of them may overwrite another.
 * - The persistence layer asks for ONE predicate per entity type and applies it
 *   to every query, whatever the call site.
 *
 * HOW IT WORKS:
 * - register() appends a filter under its concern.
 * - seal() composes each entity type's filters into one AND-ed filter, once,
 *   at model initialization. After that the registry is read-only.
 * - The composed filter is a closure over the registered filters, which
 *   themselves read the scope on every evaluation. Sealing never snapshots scope.
 *
 * RULES:
 * - One filter per (entityType, concern); a second one is a startup error.
 * - No registration after seal().
 * - Entity types without filters are unrestricted.
 */

import { sql } from 'kysely';

import type { EntityModel, EntityTypeOf, RowFilter } from './tenancy.types';
import { FilterRegistrationError } from './tenancy.errors';

/**
 * AND of every filter. Commutative: filters are pure, so order only affects
 * where evaluation short-circuits.
 */
export function allOf<M extends EntityModel, K extends EntityTypeOf<M>>(
  filters: readonly RowFilter<M, K>[],
): RowFilter<M, K> {
  const parts = [...filters];

  return {
    concern: parts.length ? parts.map((f) => f.concern).join('+') : 'none',

    matches(row, lookup) {
      return parts.every((f) => f.matches(row, lookup));
    },

    toSql(alias) {
      if (!parts.length) return sql<boolean>`true`;

      return sql<boolean>`${sql.join(
        parts.map((f) => sql`(${f.toSql(alias)})`),
        sql` and `,
      )}`;
    },
  };
}

export class FilterRegistry<M extends EntityModel> {
  private readonly filters = new Map<EntityTypeOf<M>, RowFilter<M, EntityTypeOf<M>>[]>();
  private composed: Map<EntityTypeOf<M>, RowFilter<M, EntityTypeOf<M>>> | null = null;

  register<K extends EntityTypeOf<M>>(entityType: K, filter: RowFilter<M, K>): void {
    if (this.composed) {
      throw new FilterRegistrationError(
        `Filter registry is sealed; cannot register '${filter.concern}' on '${entityType}'.`,
        entityType,
        filter.concern,
      );
    }

    const existing = this.filters.get(entityType) ?? [];
    if (existing.some((f) => f.concern === filter.concern)) {
      throw new FilterRegistrationError(
        `A '${filter.concern}' filter is already registered on '${entityType}'.`,
        entityType,
        filter.concern,
      );
    }

    this.filters.set(entityType, [...existing, filter]);
  }

  /**
   * Registers one concern on several entity types, e.g. soft-delete on the
   * whole model.
   */
  registerForAll<K extends EntityTypeOf<M>>(
    entityTypes: readonly K[],
    makeFilter: (entityType: K) => RowFilter<M, K>,
  ): void {
    for (const entityType of entityTypes) {
      this.register(entityType, makeFilter(entityType));
    }
  }

  seal(): void {
    if (this.composed) return;

    const composed = new Map<EntityTypeOf<M>, RowFilter<M, EntityTypeOf<M>>>();
    for (const [entityType, filters] of this.filters) {
      composed.set(entityType, allOf(filters));
    }
    this.composed = composed;
  }

  isSealed(): boolean {
    return this.composed !== null;
  }

  concernsOf(entityType: EntityTypeOf<M>): string[] {
    return (this.filters.get(entityType) ?? []).map((f) => f.concern);
  }

  effectivePredicate<K extends EntityTypeOf<M>>(entityType: K): RowFilter<M, K> {
    const sealed = this.composed?.get(entityType);
    if (sealed) return sealed;

    // Not sealed yet (or nothing registered): derive on demand.
    return allOf<M, K>(this.filters.get(entityType) ?? []);
  }
}
