/**
 * backend/src/modules/tenants/tenant.controller.ts
 *
 * RULES:
 * - Runs inside the request's tenant scope (see tenant.routes.ts).
 * - No DB access here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { TenantService } from './tenant.service';

export class TenantController {
  constructor(private readonly tenantService: TenantService) {}

  async listTenants(_req: FastifyRequest, reply: FastifyReply) {
    const tenants = await this.tenantService.listTenants();
    return reply.status(200).send({ tenants });
  }
}
