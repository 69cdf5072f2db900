import type { FastifyInstance } from 'fastify';
import * as taskService from '../services/taskService.js';
import type { CreateTaskRequest, TaskListQuery, TaskListResponse } from '@crewplan/shared';

// Shared by inline subtasks here and POST /api/tasks/:taskId/subtasks
export const subtaskProperties = {
  name: { type: 'string', minLength: 1, maxLength: 200 },
  duration: { type: 'integer', minimum: 1 },
  workingDuration: { type: ['integer', 'null'], minimum: 1 },
  position: { type: ['string', 'null'], maxLength: 100 },
  parallel: { type: 'boolean' },
};

// JSON schema for POST /api/projects/:projectId/tasks (create task)
const createTaskSchema = {
  body: {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      duration: { type: 'integer', minimum: 1 },
      workingDuration: { type: ['integer', 'null'], minimum: 1 },
      isGroup: { type: 'boolean' },
      position: { type: ['string', 'null'], maxLength: 100 },
      employeeId: { type: ['string', 'null'] },
      predecessors: {
        type: 'array',
        items: { type: 'string', minLength: 1 },
      },
      subtasks: {
        type: 'array',
        items: {
          type: 'object',
          required: ['name', 'duration'],
          properties: subtaskProperties,
          additionalProperties: false,
        },
      },
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

// JSON schema for GET /api/projects/:projectId/tasks (list tasks)
const listTasksSchema = {
  querystring: {
    type: 'object',
    properties: {
      includeSubtasks: { type: 'boolean' },
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

export default async function projectTaskRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/projects/:projectId/tasks
   * Lists the project's tasks in display order. Subtasks only with ?includeSubtasks=true.
   */
  fastify.get<{ Params: { projectId: string }; Querystring: TaskListQuery }>(
    '/',
    { schema: listTasksSchema },
    async (request, reply) => {
      const response: TaskListResponse = {
        tasks: taskService.listTasks(fastify.db, request.params.projectId, request.query),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/projects/:projectId/tasks
   * Creates a task; group tasks may carry their subtasks inline.
   */
  fastify.post<{ Params: { projectId: string }; Body: CreateTaskRequest }>(
    '/',
    { schema: createTaskSchema },
    async (request, reply) => {
      const task = taskService.createTask(fastify.db, request.params.projectId, request.body);
      return reply.status(201).send(task);
    },
  );
}
