/**
 * backend/src/shared/tenancy/tenancy.types.ts
 *
 * WHY:
 * - The tenancy core is generic over an "entity model": a map from entity type
 *   tag ('organization', 'employee', ...) to the row shape filters evaluate.
 * - Keeps shared/tenancy free of module imports (modules depend on it, not back).
 *
 * RULES:
 * - Every row has a numeric id and a soft-delete flag.
 * - Model maps must be declared as `type` aliases (not interfaces) so they
 *   satisfy the EntityModel index constraint.
 */

import type { RawBuilder } from 'kysely';

export type TenantId = number;

export type EntityRow = {
  id: number;
  isDeleted: boolean;
};

export type EntityModel = Record<string, EntityRow>;

export type EntityTypeOf<M extends EntityModel> = Extract<keyof M, string>;

/**
 * Unfiltered access to related rows, used by filters that need to follow an
 * ownership hop in memory (e.g. employee -> organization.tenantId).
 */
export interface RowLookup<M extends EntityModel> {
  get<K extends EntityTypeOf<M>>(type: K, id: number): M[K] | undefined;
}

export type FilterConcern = 'soft-delete' | 'tenant' | (string & {});

/**
 * A row-visibility predicate with two evaluation faces:
 * - matches(): evaluated against a row object (in-memory store)
 * - toSql(): compiled into a boolean SQL fragment over a table alias (Kysely store)
 *
 * Both faces must read ambient state (scope) lazily, on every call.
 *
 * Declared with method signatures so a registry can hold the filters of every
 * entity type in one collection.
 */
export interface RowFilter<M extends EntityModel, K extends EntityTypeOf<M>> {
  readonly concern: FilterConcern;
  matches(row: M[K], lookup: RowLookup<M>): boolean;
  toSql(alias: string): RawBuilder<boolean>;
}
