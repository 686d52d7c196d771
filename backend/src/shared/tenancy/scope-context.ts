/**
 * backend/src/shared/tenancy/scope-context.ts
 *
 * WHY:
 * - Every query must know which tenant the current unit of work may see,
 *   without threading a tenantId parameter through every call.
 * - The value must follow the async unit of work (across awaits), not a
 *   module-level variable: concurrent requests interleave on one event loop.
 *
 * HOW TO USE:
 * - Request layer: `scope.withScope(tenantId, () => handler(req, reply))`
 * - Admin paths:   `scope.withScope(null, () => listEverything())`
 * - Anywhere below: `scope.current()`
 *
 * RULES:
 * - null = unrestricted (administrative). This class never rejects it;
 *   callers that need a tenant enforce that at their boundary.
 * - Scopes nest strictly: the previous value is back as soon as `fn` returns,
 *   throws, or its promise settles.
 * - Work spawned inside a scope keeps the snapshot it was started with;
 *   a later nested scope in the parent is never visible to it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import type { TenantId } from './tenancy.types';

type ScopeFrame = Readonly<{ tenantId: TenantId | null }>;

export class ScopeContext {
  private readonly storage = new AsyncLocalStorage<ScopeFrame>();

  current(): TenantId | null {
    return this.storage.getStore()?.tenantId ?? null;
  }

  isUnrestricted(): boolean {
    return this.current() === null;
  }

  withScope<T>(tenantId: TenantId | null, fn: () => T): T {
    return this.storage.run({ tenantId }, fn);
  }
}
