import { describe, it, expect } from 'vitest';
import { sql } from 'kysely';

import {
  FilterRegistrationError,
  FilterRegistry,
  ScopeContext,
  softDeleteFilter,
  TenantPredicateFactory,
  type RowFilter,
  type RowLookup,
} from '../../../../src/shared/tenancy';
import { buildEntityFilters } from '../../../../src/modules/_shared/entity-model';
import { createColdKysely } from '../../../helpers/cold-kysely';

type Widget = { id: number; isDeleted: boolean; ownerId: number };
type Gadget = { id: number; isDeleted: boolean };
type TestModel = { widget: Widget; gadget: Gadget };

const noLookup: RowLookup<TestModel> = { get: () => undefined };

function ownerFilter(ownerId: number): RowFilter<TestModel, 'widget'> {
  return {
    concern: 'owner',
    matches: (row) => row.ownerId === ownerId,
    toSql: (alias) => sql<boolean>`${sql.ref(`${alias}.owner_id`)} = ${ownerId}`,
  };
}

const widgets: Widget[] = [
  { id: 1, isDeleted: false, ownerId: 1 },
  { id: 2, isDeleted: true, ownerId: 1 },
  { id: 3, isDeleted: false, ownerId: 2 },
  { id: 4, isDeleted: true, ownerId: 2 },
];

function visibleIds(registry: FilterRegistry<TestModel>): number[] {
  const predicate = registry.effectivePredicate('widget');
  return widgets.filter((w) => predicate.matches(w, noLookup)).map((w) => w.id);
}

describe('FilterRegistry', () => {
  it('ANDs every concern registered for an entity type', () => {
    const registry = new FilterRegistry<TestModel>();
    registry.register('widget', softDeleteFilter<TestModel, 'widget'>());
    registry.register('widget', ownerFilter(1));
    registry.seal();

    expect(visibleIds(registry)).toEqual([1]);
    expect(registry.effectivePredicate('widget').concern).toBe('soft-delete+owner');
  });

  it('gives the same results whatever the registration order', () => {
    const forward = new FilterRegistry<TestModel>();
    forward.register('widget', softDeleteFilter<TestModel, 'widget'>());
    forward.register('widget', ownerFilter(2));
    forward.seal();

    const backward = new FilterRegistry<TestModel>();
    backward.register('widget', ownerFilter(2));
    backward.register('widget', softDeleteFilter<TestModel, 'widget'>());
    backward.seal();

    expect(visibleIds(forward)).toEqual([3]);
    expect(visibleIds(backward)).toEqual(visibleIds(forward));
  });

  it('leaves entity types without filters unrestricted', () => {
    const registry = new FilterRegistry<TestModel>();
    registry.register('widget', softDeleteFilter<TestModel, 'widget'>());
    registry.seal();

    const predicate = registry.effectivePredicate('gadget');

    expect(predicate.concern).toBe('none');
    expect(predicate.matches({ id: 1, isDeleted: true }, noLookup)).toBe(true);
  });

  it('registers one concern on several entity types', () => {
    const registry = new FilterRegistry<TestModel>();
    registry.registerForAll(['widget', 'gadget'], () =>
      softDeleteFilter<TestModel, 'widget' | 'gadget'>(),
    );

    expect(registry.concernsOf('widget')).toEqual(['soft-delete']);
    expect(registry.concernsOf('gadget')).toEqual(['soft-delete']);
    expect(registry.effectivePredicate('gadget').matches({ id: 1, isDeleted: true }, noLookup)).toBe(
      false,
    );
  });

  it('rejects a second filter for the same concern on one entity type', () => {
    const registry = new FilterRegistry<TestModel>();
    registry.register('widget', softDeleteFilter<TestModel, 'widget'>());

    let caught: unknown;
    try {
      registry.register('widget', softDeleteFilter<TestModel, 'widget'>('deleted'));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(FilterRegistrationError);
    if (!(caught instanceof FilterRegistrationError)) return;

    expect(caught.entityType).toBe('widget');
    expect(caught.concern).toBe('soft-delete');
    expect(caught.message).toBe("A 'soft-delete' filter is already registered on 'widget'.");
  });

  it('rejects registration after seal()', () => {
    const registry = new FilterRegistry<TestModel>();
    registry.register('widget', softDeleteFilter<TestModel, 'widget'>());
    registry.seal();

    expect(registry.isSealed()).toBe(true);
    expect(() => registry.register('widget', ownerFilter(1))).toThrow(
      "Filter registry is sealed; cannot register 'owner' on 'widget'.",
    );
    expect(() => registry.register('gadget', softDeleteFilter<TestModel, 'gadget'>())).toThrow(
      FilterRegistrationError,
    );
  });

  it('composes on demand before seal()', () => {
    const registry = new FilterRegistry<TestModel>();
    registry.register('widget', ownerFilter(2));

    expect(registry.isSealed()).toBe(false);
    expect(visibleIds(registry)).toEqual([3, 4]);
  });

  it('reads the live scope on every evaluation, never at seal time', () => {
    const scope = new ScopeContext();
    const tenancy = new TenantPredicateFactory<TestModel>(scope).ownedDirectly('widget', {
      table: 'widgets',
      column: 'owner_id',
      tenantIdOf: (w) => w.ownerId,
    });

    const registry = new FilterRegistry<TestModel>();
    registry.register('widget', softDeleteFilter<TestModel, 'widget'>());
    // sealed inside a scope: that scope must not be captured
    scope.withScope(1, () => {
      registry.register('widget', tenancy.forEntity('widget'));
      registry.seal();
    });

    expect(scope.withScope(1, () => visibleIds(registry))).toEqual([1]);
    expect(scope.withScope(2, () => visibleIds(registry))).toEqual([3]);
    expect(scope.withScope(3, () => visibleIds(registry))).toEqual([]);
    expect(visibleIds(registry)).toEqual([1, 3]);
  });

  describe('toSql', () => {
    it('compiles the effective predicate into one parenthesised conjunction', () => {
      const { db } = createColdKysely();
      const scope = new ScopeContext();
      const filters = buildEntityFilters(scope);

      const compiled = scope.withScope(1, () =>
        filters.effectivePredicate('organization').toSql('organizations').compile(db),
      );

      expect(compiled.sql).toBe(
        '("organizations"."is_deleted" = false) and ("organizations"."tenant_id" = $1)',
      );
      expect(compiled.parameters).toEqual([1]);
    });

    it('keeps the soft-delete part in the unrestricted scope', () => {
      const { db } = createColdKysely();
      const scope = new ScopeContext();
      const filters = buildEntityFilters(scope);

      const compiled = filters.effectivePredicate('tenant').toSql('tenants').compile(db);

      expect(compiled.sql).toBe('("tenants"."is_deleted" = false) and (true)');
      expect(compiled.parameters).toEqual([]);
    });

    it('compiles an entity type without filters to true', () => {
      const { db } = createColdKysely();
      const registry = new FilterRegistry<TestModel>();
      registry.seal();

      const compiled = registry.effectivePredicate('gadget').toSql('gadgets').compile(db);

      expect(compiled.sql).toBe('true');
      expect(compiled.parameters).toEqual([]);
    });
  });
});

describe('buildEntityFilters', () => {
  it('registers soft-delete and tenant on every model entity and seals', () => {
    const filters = buildEntityFilters(new ScopeContext());

    expect(filters.isSealed()).toBe(true);
    expect(filters.concernsOf('tenant')).toEqual(['soft-delete', 'tenant']);
    expect(filters.concernsOf('organization')).toEqual(['soft-delete', 'tenant']);
    expect(filters.concernsOf('employee')).toEqual(['soft-delete', 'tenant']);
  });
});
