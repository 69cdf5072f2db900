import fp from 'fastify-plugin';
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { ApiErrorResponse, ErrorCode } from '@crewplan/shared';
import { AppError, CircularDependencyError } from '../errors/AppError.js';
import { RelaxationLimitError } from '../services/scheduling/longestPath.js';

const ROUTE_PARAMS = ['projectId', 'taskId', 'employeeId'] as const;

/**
 * The project, task or employee a request addresses, for log context.
 */
function routeContext(request: FastifyRequest): Record<string, string> {
  const context: Record<string, string> = {};
  const params: unknown = request.params;
  if (typeof params !== 'object' || params === null) return context;

  for (const key of ROUTE_PARAMS) {
    const value: unknown = Reflect.get(params, key);
    if (typeof value === 'string') context[key] = value;
  }
  return context;
}

function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
) {
  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
  return reply.status(statusCode).send(response);
}

export default fp(
  async function errorHandlerPlugin(fastify) {
    fastify.setErrorHandler<FastifyError>((error, request, reply) => {
      const context = routeContext(request);

      // Predecessor cycles: from task edits, or from stored data on a schedule run
      if (error instanceof CircularDependencyError) {
        const cycle = error.details?.cycle;
        request.log.warn(
          {
            ...context,
            cycle,
            cycleLength: Array.isArray(cycle) ? cycle.length : 0,
            route: request.routeOptions.url,
          },
          error.message,
        );
        return sendError(reply, error.statusCode, error.code, error.message, error.details);
      }

      if (error instanceof AppError) {
        const level = error.statusCode >= 500 ? 'error' : 'warn';
        request.log[level]({ err: error, ...context }, error.message);
        return sendError(reply, error.statusCode, error.code, error.message, error.details);
      }

      // Solver fault: cycles are rejected before relaxation starts
      if (error instanceof RelaxationLimitError) {
        request.log.error(
          { err: error, ...context, passes: error.passes },
          'Schedule solver failed',
        );
        return sendError(reply, 500, 'SCHEDULE_FAILED', 'The schedule could not be computed', {
          passes: error.passes,
        });
      }

      // Fastify/AJV validation errors (schema validation)
      if (error.validation) {
        request.log.warn(
          { err: error, ...context, context: error.validationContext },
          'Validation error',
        );
        return sendError(reply, 400, 'VALIDATION_ERROR', 'Validation failed', {
          fields: error.validation.map((v) => ({
            path: v.instancePath || '/',
            message: v.message,
            ...(v.params && { params: v.params }),
          })),
        });
      }

      request.log.error({ err: error, ...context }, 'Unhandled error');

      const isProduction = fastify.config.nodeEnv === 'production';
      return sendError(
        reply,
        500,
        'INTERNAL_ERROR',
        isProduction ? 'An internal error occurred' : error.message,
      );
    });
  },
  {
    name: 'error-handler',
    dependencies: ['config'],
  },
);
