/**
 * backend/src/shared/store/inmem-entity-store.ts
 *
 * WHY:
 * - Lets tests (and local runs with STORE_DRIVER=memory) exercise the exact
 *   same filters as Postgres without external infra.
 * - Filters are evaluated through their matches() face; ownership hops resolve
 *   parents through InMemRowSet (raw, unfiltered rows).
 *
 * HOW TO USE:
 * - const rows = new InMemRowSet<Model>({ a: new Map(), b: new Map() })
 * - const table = new InMemTable({ entityType: 'a', rows, filters, build })
 *
 * RULES:
 * - Returned rows are copies; callers cannot mutate stored state.
 * - JavaScript is single-threaded, so Maps need no locking.
 */

import type { FilterRegistry } from '../tenancy/filter-registry';
import type { EntityModel, EntityTypeOf, RowLookup } from '../tenancy/tenancy.types';
import type { EntityTable } from './entity-table';

export type InMemTables<M extends EntityModel> = {
  [K in EntityTypeOf<M>]: Map<number, M[K]>;
};

export class InMemRowSet<M extends EntityModel> implements RowLookup<M> {
  constructor(private readonly tables: InMemTables<M>) {}

  table<K extends EntityTypeOf<M>>(entityType: K): Map<number, M[K]> {
    return this.tables[entityType];
  }

  get<K extends EntityTypeOf<M>>(entityType: K, id: number): M[K] | undefined {
    return this.table(entityType).get(id);
  }
}

export class InMemTable<M extends EntityModel, K extends EntityTypeOf<M>, NewRow>
  implements EntityTable<M[K], NewRow>
{
  private lastId = 0;

  constructor(
    private readonly opts: {
      entityType: K;
      rows: InMemRowSet<M>;
      filters: FilterRegistry<M>;
      build: (id: number, values: NewRow) => M[K];
    },
  ) {}

  private get rows(): Map<number, M[K]> {
    return this.opts.rows.table(this.opts.entityType);
  }

  private isVisible(row: M[K]): boolean {
    return this.opts.filters
      .effectivePredicate(this.opts.entityType)
      .matches(row, this.opts.rows);
  }

  private findVisible(id: number): M[K] | undefined {
    const row = this.rows.get(id);
    return row && this.isVisible(row) ? row : undefined;
  }

  list(): Promise<M[K][]> {
    const visible = [...this.rows.values()]
      .filter((row) => this.isVisible(row))
      .sort((a, b) => a.id - b.id)
      .map((row) => ({ ...row }));

    return Promise.resolve(visible);
  }

  findById(id: number): Promise<M[K] | undefined> {
    const row = this.findVisible(id);
    return Promise.resolve(row ? { ...row } : undefined);
  }

  exists(id: number): Promise<boolean> {
    return Promise.resolve(this.findVisible(id) !== undefined);
  }

  insert(values: NewRow): Promise<M[K]> {
    this.lastId += 1;
    const row = this.opts.build(this.lastId, values);
    this.rows.set(row.id, row);

    return Promise.resolve({ ...row });
  }

  softDelete(id: number): Promise<boolean> {
    const row = this.findVisible(id);
    if (!row) return Promise.resolve(false);

    this.rows.set(id, { ...row, isDeleted: true });
    return Promise.resolve(true);
  }
}
