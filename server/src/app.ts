import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import { sql } from 'drizzle-orm';
import type { ApiErrorResponse } from '@crewplan/shared';
import configPlugin from './plugins/config.js';
import dbPlugin from './plugins/db.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import projectRoutes from './routes/projects.js';
import projectTaskRoutes from './routes/projectTasks.js';
import taskRoutes from './routes/tasks.js';
import employeeRoutes from './routes/employees.js';
import scheduleRoutes from './routes/schedule.js';
import templateRoutes from './routes/templates.js';

export interface BuildAppOptions {
  /** Log destination; stdout when omitted. */
  logStream?: { write(line: string): void };
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: process.env.LOG_LEVEL || 'info',
      ...(options.logStream && { stream: options.logStream }),
    },
    trustProxy: process.env.TRUST_PROXY === 'true',
  });

  // Configuration (must be first)
  await app.register(configPlugin);

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  // Compression (gzip/deflate/brotli)
  await app.register(fastifyCompress);

  // Database connection & migrations
  await app.register(dbPlugin);

  // Project routes
  await app.register(projectRoutes, { prefix: '/api/projects' });

  // Project templates
  await app.register(templateRoutes, { prefix: '/api/templates' });

  // Task routes (nested under projects for listing and creation)
  await app.register(projectTaskRoutes, { prefix: '/api/projects/:projectId/tasks' });
  await app.register(taskRoutes, { prefix: '/api/tasks' });

  // Employee routes
  await app.register(employeeRoutes, { prefix: '/api/employees' });

  // Scheduling (critical path, calendar dates, personnel assignment)
  await app.register(scheduleRoutes, { prefix: '/api/projects/:projectId/schedule' });

  // Health check endpoint (liveness)
  app.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Readiness probe: verifies the database answers
  app.get('/api/health/ready', async () => {
    app.db.run(sql`SELECT 1`);
    return { status: 'ready', timestamp: new Date().toISOString() };
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiErrorResponse = request.url.startsWith('/api/')
      ? {
          error: {
            code: 'ROUTE_NOT_FOUND',
            message: `Route ${request.method} ${request.url} not found`,
          },
        }
      : {
          error: {
            code: 'NOT_FOUND',
            message: 'Only the JSON API under /api/ is served',
          },
        };
    return reply.status(404).send(response);
  });

  return app;
}
