/**
 * backend/src/shared/tenancy/parent-visibility.ts
 *
 * WHY:
 * - A child row (employee, organization) may only point at a parent the caller
 *   can see. The existence query runs through the parent's effective filter,
 *   so a parent owned by another tenant simply does not exist for this caller.
 * - This is the ONLY tenant-boundary check on writes. Visibility is authorization.
 *
 * RULES:
 * - Call before any mutation (no partial writes on failure).
 * - Failure is NOT_FOUND, never a forbidden-style error.
 */

import { TenancyErrors } from './tenancy.errors';

export type ParentTable = {
  exists(id: number): Promise<boolean>;
};

export type ParentRef = {
  entity: string;
  id: number;
};

export async function validateParentExists(parents: ParentTable, parentId: number): Promise<boolean> {
  return parents.exists(parentId);
}

export async function requireVisibleParent(parents: ParentTable, ref: ParentRef): Promise<void> {
  const visible = await validateParentExists(parents, ref.id);
  if (!visible) {
    throw TenancyErrors.parentNotVisible(ref.entity, { parentId: ref.id });
  }
}
