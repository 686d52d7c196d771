/**
 * backend/src/modules/organizations/organization.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates request payload and returns response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { createOrganizationSchema, organizationIdParamsSchema } from './organization.schemas';
import type { OrganizationService } from './organization.service';

export class OrganizationController {
  constructor(private readonly organizationService: OrganizationService) {}

  async listOrganizations(_req: FastifyRequest, reply: FastifyReply) {
    const organizations = await this.organizationService.listOrganizations();
    return reply.status(200).send({ organizations });
  }

  async listAllOrganizations(_req: FastifyRequest, reply: FastifyReply) {
    const organizations = await this.organizationService.listAllOrganizations();
    return reply.status(200).send({ organizations });
  }

  async createOrganization(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createOrganizationSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const organization = await this.organizationService.createOrganization(parsed.data);
    return reply.status(201).send({ organization });
  }

  async deleteOrganization(req: FastifyRequest, reply: FastifyReply) {
    const parsed = organizationIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid organization id', {
        issues: parsed.error.issues,
      });
    }

    await this.organizationService.deleteOrganization(parsed.data.id);
    return reply.status(204).send();
  }
}
