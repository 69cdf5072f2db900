import type { FastifyInstance } from 'fastify';
import * as taskService from '../services/taskService.js';
import type {
  CreateSubtaskRequest,
  TaskListResponse,
  UpdateTaskRequest,
} from '@crewplan/shared';
import { subtaskProperties } from './projectTasks.js';

// JSON schema for task ID in path params
const taskIdSchema = {
  params: {
    type: 'object',
    required: ['taskId'],
    properties: {
      taskId: { type: 'string' },
    },
  },
};

// JSON schema for PATCH /api/tasks/:taskId (update task)
const updateTaskSchema = {
  body: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      duration: { type: 'integer', minimum: 1 },
      workingDuration: { type: ['integer', 'null'], minimum: 1 },
      parallel: { type: 'boolean' },
      position: { type: ['string', 'null'], maxLength: 100 },
      employeeId: { type: ['string', 'null'] },
      predecessors: {
        type: 'array',
        items: { type: 'string', minLength: 1 },
      },
    },
    additionalProperties: false,
    minProperties: 1,
  },
  ...taskIdSchema,
};

// JSON schema for POST /api/tasks/:taskId/subtasks (add subtask)
const createSubtaskSchema = {
  body: {
    type: 'object',
    required: ['name', 'duration'],
    properties: subtaskProperties,
    additionalProperties: false,
  },
  ...taskIdSchema,
};

export default async function taskRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/tasks/:taskId
   * Returns a task with its subtasks.
   */
  fastify.get<{ Params: { taskId: string } }>(
    '/:taskId',
    { schema: taskIdSchema },
    async (request, reply) => {
      const task = taskService.getTask(fastify.db, request.params.taskId);
      return reply.status(200).send(task);
    },
  );

  /**
   * PATCH /api/tasks/:taskId
   * Updates a task. New predecessors are checked for cycles (409 CIRCULAR_DEPENDENCY).
   */
  fastify.patch<{ Params: { taskId: string }; Body: UpdateTaskRequest }>(
    '/:taskId',
    { schema: updateTaskSchema },
    async (request, reply) => {
      const task = taskService.updateTask(fastify.db, request.params.taskId, request.body);
      return reply.status(200).send(task);
    },
  );

  /**
   * DELETE /api/tasks/:taskId
   * Deletes a task and its subtasks, and drops it from other tasks' predecessors.
   */
  fastify.delete<{ Params: { taskId: string } }>(
    '/:taskId',
    { schema: taskIdSchema },
    async (request, reply) => {
      taskService.deleteTask(fastify.db, request.params.taskId);
      return reply.status(204).send();
    },
  );

  /**
   * GET /api/tasks/:taskId/subtasks
   */
  fastify.get<{ Params: { taskId: string } }>(
    '/:taskId/subtasks',
    { schema: taskIdSchema },
    async (request, reply) => {
      const response: TaskListResponse = {
        tasks: taskService.getSubtasks(fastify.db, request.params.taskId),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/tasks/:taskId/subtasks
   * Adds a subtask to a group task.
   */
  fastify.post<{ Params: { taskId: string }; Body: CreateSubtaskRequest }>(
    '/:taskId/subtasks',
    { schema: createSubtaskSchema },
    async (request, reply) => {
      const subtask = taskService.createSubtask(fastify.db, request.params.taskId, request.body);
      return reply.status(201).send(subtask);
    },
  );
}
