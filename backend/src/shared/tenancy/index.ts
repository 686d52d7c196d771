/**
 * backend/src/shared/tenancy/index.ts
 *
 * Public surface of the tenant-scoping core.
 */

export { ScopeContext } from './scope-context';
export { FilterRegistry, allOf } from './filter-registry';
export { TenantPredicateFactory } from './tenant-filter.factory';
export { softDeleteFilter } from './soft-delete.filter';
export { requireVisibleParent, validateParentExists } from './parent-visibility';
export type { ParentRef, ParentTable } from './parent-visibility';
export { TenancyErrors, FilterRegistrationError } from './tenancy.errors';
export type {
  EntityModel,
  EntityRow,
  EntityTypeOf,
  FilterConcern,
  RowFilter,
  RowLookup,
  TenantId,
} from './tenancy.types';
