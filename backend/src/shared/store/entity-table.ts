/**
 * backend/src/shared/store/entity-table.ts
 *
 * WHY:
 * - Services depend on this abstraction, not on Kysely or on Maps, so the same
 *   module code runs against Postgres and against the in-memory store.
 *
 * RULES:
 * - Every read (list/findById/exists) and the target lookup of softDelete go
 *   through the entity type's effective filter. Implementations must not offer
 *   an unfiltered read.
 * - insert() does no visibility check; callers validate parents first.
 * - Deletion is logical only.
 */

export interface EntityTable<Row, NewRow> {
  /** Visible rows, ordered by id. */
  list(): Promise<Row[]>;

  findById(id: number): Promise<Row | undefined>;

  exists(id: number): Promise<boolean>;

  insert(values: NewRow): Promise<Row>;

  /**
   * Marks a visible row deleted. Returns false when no visible row matched
   * (unknown id, other tenant, or already deleted).
   */
  softDelete(id: number): Promise<boolean>;
}
