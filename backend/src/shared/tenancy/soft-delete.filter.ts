import { sql } from 'kysely';

import type { EntityModel, EntityTypeOf, RowFilter } from './tenancy.types';

/**
 * Hides logically deleted rows. Applies in every scope, including the
 * unrestricted one.
 */
export function softDeleteFilter<M extends EntityModel, K extends EntityTypeOf<M>>(
  column = 'is_deleted',
): RowFilter<M, K> {
  return {
    concern: 'soft-delete',

    matches(row) {
      return !row.isDeleted;
    },

    toSql(alias) {
      return sql<boolean>`${sql.ref(`${alias}.${column}`)} = false`;
    },
  };
}
