/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates (when no tenant exists yet):
 * - the tenants listed in dev-seed.json
 * - their organizations and employees
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Runs in the unrestricted scope: it must see every tenant to decide
 *   whether seeding already happened.
 * - Goes through the EntityStore, so it works for both store drivers.
 */

import { z } from 'zod';

import rawSeedData from './dev-seed.json';

import type { ScopeContext } from '../../tenancy';
import type { EntityStore } from '../../../modules/_shared/entity-store';
import { logger } from '../../logger/logger';

const SeedFileSchema = z.object({
  tenants: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().nullable().default(null),
      organizations: z.array(
        z.object({
          name: z.string().min(1),
          employees: z.array(z.object({ name: z.string().min(1), code: z.string().min(1) })),
        }),
      ),
    }),
  ),
});

export type DevSeedData = z.infer<typeof SeedFileSchema>;

export type DevSeedResult = {
  seeded: boolean;
  tenants: number;
  organizations: number;
  employees: number;
};

export function loadDevSeedData(raw: unknown = rawSeedData): DevSeedData {
  return SeedFileSchema.parse(raw);
}

export async function runDevSeed(opts: {
  store: EntityStore;
  scope: ScopeContext;
  data?: DevSeedData;
}): Promise<DevSeedResult> {
  const { store, scope } = opts;
  const flow = 'seed.dev';

  return scope.withScope(null, async () => {
    const existing = await store.tenant.list();
    if (existing.length > 0) {
      logger.info('seed.skipped_existing_data', { flow, tenants: existing.length });
      return { seeded: false, tenants: 0, organizations: 0, employees: 0 };
    }

    const data = opts.data ?? loadDevSeedData();
    const result: DevSeedResult = { seeded: true, tenants: 0, organizations: 0, employees: 0 };

    for (const tenantSeed of data.tenants) {
      const tenant = await store.tenant.insert({
        name: tenantSeed.name,
        description: tenantSeed.description,
      });
      result.tenants += 1;

      for (const organizationSeed of tenantSeed.organizations) {
        const organization = await store.organization.insert({
          tenantId: tenant.id,
          name: organizationSeed.name,
        });
        result.organizations += 1;

        for (const employeeSeed of organizationSeed.employees) {
          await store.employee.insert({
            organizationId: organization.id,
            name: employeeSeed.name,
            code: employeeSeed.code,
          });
          result.employees += 1;
        }
      }
    }

    logger.info('seed.done', { flow, ...result });
    return result;
  });
}
