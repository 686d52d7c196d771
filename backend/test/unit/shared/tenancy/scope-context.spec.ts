import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';

import { ScopeContext } from '../../../../src/shared/tenancy';

describe('ScopeContext', () => {
  it('is unrestricted outside any scope', () => {
    const scope = new ScopeContext();

    expect(scope.current()).toBeNull();
    expect(scope.isUnrestricted()).toBe(true);
  });

  it('exposes the innermost scope and restores the outer one on exit', () => {
    const scope = new ScopeContext();
    const seen: Array<number | null> = [];

    scope.withScope(1, () => {
      seen.push(scope.current());
      scope.withScope(2, () => {
        seen.push(scope.current());
        scope.withScope(null, () => {
          seen.push(scope.current());
        });
        seen.push(scope.current());
      });
      seen.push(scope.current());
    });
    seen.push(scope.current());

    expect(seen).toEqual([1, 2, null, 2, 1, null]);
  });

  it('returns the callback result', () => {
    const scope = new ScopeContext();

    expect(scope.withScope(7, () => scope.current())).toBe(7);
  });

  it('restores the prior scope when the callback throws', () => {
    const scope = new ScopeContext();

    scope.withScope(1, () => {
      expect(() =>
        scope.withScope(2, () => {
          throw new Error('boom');
        }),
      ).toThrow('boom');

      expect(scope.current()).toBe(1);
    });
  });

  it('keeps the scope across awaits and restores it when the promise rejects', async () => {
    const scope = new ScopeContext();

    await scope.withScope(1, async () => {
      await expect(
        scope.withScope(2, async () => {
          await sleep(1);
          expect(scope.current()).toBe(2);
          throw new Error('rejected');
        }),
      ).rejects.toThrow('rejected');

      expect(scope.current()).toBe(1);
    });

    expect(scope.current()).toBeNull();
  });

  it('restores every level of a deep nesting', () => {
    const scope = new ScopeContext();

    const descend = (depth: number): number[] => {
      if (depth > 50) return [];
      return scope.withScope(depth, () => {
        const below = descend(depth + 1);
        return [scope.current() ?? -1, ...below];
      });
    };

    const observed = descend(1);

    expect(observed).toHaveLength(50);
    expect(observed[0]).toBe(1);
    expect(observed[49]).toBe(50);
    expect(scope.current()).toBeNull();
  });

  it('isolates concurrent units of work under interleaved awaits', async () => {
    const scope = new ScopeContext();

    const unit = (tenantId: number, delays: number[]) =>
      scope.withScope(tenantId, async () => {
        const seen: Array<number | null> = [];
        for (const ms of delays) {
          await sleep(ms);
          seen.push(scope.current());
        }
        return seen;
      });

    const [a, b] = await Promise.all([unit(1, [5, 1, 5]), unit(2, [1, 5, 1])]);

    expect(a).toEqual([1, 1, 1]);
    expect(b).toEqual([2, 2, 2]);
  });

  it('gives work spawned inside a scope the snapshot it started with', async () => {
    const scope = new ScopeContext();
    const gate = sleep(5);

    const childResult = await scope.withScope(1, async () => {
      const child = (async () => {
        await gate;
        return scope.current();
      })();

      // a later nested scope in the parent is not observed by the child
      await scope.withScope(2, async () => {
        await gate;
      });

      return child;
    });

    expect(childResult).toBe(1);
  });

  it('does not share state between instances', () => {
    const a = new ScopeContext();
    const b = new ScopeContext();

    a.withScope(1, () => {
      expect(b.current()).toBeNull();
    });
  });
});
