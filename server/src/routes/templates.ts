import type { FastifyInstance } from 'fastify';
import type { TemplateListResponse } from '@crewplan/shared';
import { listTemplates } from '../services/templateService.js';

export default async function templateRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/templates
   * Built-in project templates a new project can start from.
   */
  fastify.get('/', async (_request, reply) => {
    const response: TemplateListResponse = { templates: listTemplates() };
    return reply.status(200).send(response);
  });
}
