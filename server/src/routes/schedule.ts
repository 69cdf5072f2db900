import type { FastifyInstance } from 'fastify';
import type { ScheduleRequest } from '@crewplan/shared';
import { CircularDependencyError } from '../errors/AppError.js';
import { runSchedule } from '../services/scheduleService.js';

// ─── JSON schema ─────────────────────────────────────────────────────────────

const scheduleBodySchema = {
  body: {
    type: 'object',
    properties: {
      apply: { type: 'boolean' },
      daysOffAware: { type: 'boolean' },
    },
    additionalProperties: false,
  },
  params: {
    type: 'object',
    required: ['projectId'],
    properties: {
      projectId: { type: 'string' },
    },
  },
};

// ─── Route plugin ─────────────────────────────────────────────────────────────

export default async function scheduleRoutes(fastify: FastifyInstance) {
  /**
   * POST /api/projects/:projectId/schedule
   * Compute the project's schedule: critical path, task dates and assignments.
   * Preview by default; `apply: true` writes dates and assignments back.
   */
  fastify.post<{ Params: { projectId: string }; Body: ScheduleRequest | undefined }>(
    '/',
    { schema: scheduleBodySchema },
    async (request, reply) => {
      const { apply = false, daysOffAware = true } = request.body ?? {};

      const result = runSchedule(fastify.db, request.params.projectId, {
        apply,
        daysOffAware,
        defaultDaysOff: fastify.config.defaultDaysOff,
        horizonDays: fastify.config.availabilityHorizonDays,
        logger: request.log,
      });

      // Surface circular dependency as a 409 error
      if (result.error === 'cyclic_dependency') {
        throw new CircularDependencyError('The task graph contains a circular dependency', {
          cycle: result.cycleTaskIds ?? [],
        });
      }

      return reply.status(200).send(result);
    },
  );
}
