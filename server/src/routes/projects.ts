import type { FastifyInstance } from 'fastify';
import * as projectService from '../services/projectService.js';
import { createProjectFromTemplate } from '../services/templateService.js';
import { getEmployeeWorkload } from '../services/employeeService.js';
import type { CreateProjectRequest, ProjectListResponse } from '@crewplan/shared';

// JSON schema for POST /api/projects (create project)
const createProjectSchema = {
  body: {
    type: 'object',
    required: ['name', 'startDate'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      startDate: { type: 'string', format: 'date' },
      templateId: { type: 'string', minLength: 1 },
    },
    additionalProperties: false,
  },
};

// JSON schema for project ID in path params
const projectIdSchema = {
  params: {
    type: 'object',
    required: ['projectId'],
    properties: {
      projectId: { type: 'string' },
    },
  },
};

export default async function projectRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/projects
   * Returns all projects, newest first, with their task counts.
   */
  fastify.get('/', async (_request, reply) => {
    const response: ProjectListResponse = { projects: projectService.listProjects(fastify.db) };
    return reply.status(200).send(response);
  });

  /**
   * POST /api/projects
   * Creates a new project, seeded with a template's tasks when templateId is given.
   */
  fastify.post<{ Body: CreateProjectRequest }>(
    '/',
    { schema: createProjectSchema },
    async (request, reply) => {
      const { templateId } = request.body;
      const project =
        templateId === undefined
          ? projectService.createProject(fastify.db, request.body)
          : createProjectFromTemplate(
              fastify.db,
              { ...request.body, templateId },
              { logger: request.log },
            );
      return reply.status(201).send(project);
    },
  );

  /**
   * GET /api/projects/:projectId
   */
  fastify.get<{ Params: { projectId: string } }>(
    '/:projectId',
    { schema: projectIdSchema },
    async (request, reply) => {
      const project = projectService.getProject(fastify.db, request.params.projectId);
      return reply.status(200).send(project);
    },
  );

  /**
   * DELETE /api/projects/:projectId
   * Deletes a project. Cascades to its tasks.
   */
  fastify.delete<{ Params: { projectId: string } }>(
    '/:projectId',
    { schema: projectIdSchema },
    async (request, reply) => {
      projectService.deleteProject(fastify.db, request.params.projectId);
      return reply.status(204).send();
    },
  );

  /**
   * GET /api/projects/:projectId/workload
   * Per-employee workload of the project, grouped by position.
   */
  fastify.get<{ Params: { projectId: string } }>(
    '/:projectId/workload',
    { schema: projectIdSchema },
    async (request, reply) => {
      const workload = getEmployeeWorkload(fastify.db, request.params.projectId);
      return reply.status(200).send(workload);
    },
  );
}
