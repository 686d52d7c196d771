import { describe, it, expect } from 'vitest';

import { AppError } from '../../../src/shared/http/errors';
import { logger } from '../../../src/shared/logger/logger';
import { OrganizationService } from '../../../src/modules/organizations/organization.service';
import { createInMemFixture, seedTwoTenants } from '../../helpers/tenancy-fixtures';

async function setup() {
  const fixture = createInMemFixture();
  const seeded = await seedTwoTenants(fixture.store);
  const service = new OrganizationService({
    store: fixture.store,
    scope: fixture.scope,
    logger,
  });
  return { ...fixture, ...seeded, service };
}

describe('OrganizationService', () => {
  it('lists the organizations of the current tenant only', async () => {
    const { scope, service } = await setup();

    const orgs = await scope.withScope(1, () => service.listOrganizations());

    expect(orgs.map((o) => o.name)).toEqual(['Acme Ops']);
  });

  it('lists every tenant organization on the administrative path', async () => {
    const { scope, service } = await setup();

    const orgs = await scope.withScope(1, async () => {
      const all = await service.listAllOrganizations();
      // the caller's scope is back once the unrestricted listing returns
      expect(scope.current()).toBe(1);
      return all;
    });

    expect(orgs.map((o) => o.tenantId)).toEqual([1, 2]);
  });

  it('creates an organization under a visible tenant', async () => {
    const { scope, service } = await setup();

    const created = await scope.withScope(1, () =>
      service.createOrganization({ tenantId: 1, name: 'Acme Sales' }),
    );

    expect(created).toEqual({ id: 3, tenantId: 1, name: 'Acme Sales', isDeleted: false });
  });

  it('refuses to create an organization under another tenant and writes nothing', async () => {
    const { scope, store, service } = await setup();

    await expect(
      scope.withScope(1, () => service.createOrganization({ tenantId: 2, name: 'Intruder' })),
    ).rejects.toThrow('Tenant not found.');

    const all = await store.organization.list();
    expect(all.map((o) => o.name)).toEqual(['Acme Ops', 'Globex R&D']);
  });

  it('soft-deletes a visible organization', async () => {
    const { scope, service } = await setup();

    await scope.withScope(1, () => service.deleteOrganization(1));

    await expect(scope.withScope(1, () => service.listOrganizations())).resolves.toEqual([]);
    const all = await service.listAllOrganizations();
    expect(all.map((o) => o.id)).toEqual([2]);
  });

  it('reports an invisible organization as NOT_FOUND on delete', async () => {
    const { scope, service } = await setup();

    const err = await scope
      .withScope(2, () => service.deleteOrganization(1))
      .then(
        () => null,
        (e: unknown) => e,
      );

    expect(err).toBeInstanceOf(AppError);
    if (!(err instanceof AppError)) return;
    expect(err.code).toBe('NOT_FOUND');
    expect(err.message).toBe('Organization not found.');
  });
});
