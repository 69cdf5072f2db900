import type { FastifyInstance } from 'fastify';
import * as employeeService from '../services/employeeService.js';
import type {
  CreateEmployeeRequest,
  EmployeeAvailabilityResponse,
  EmployeeListQuery,
  EmployeeListResponse,
  UpdateEmployeeRequest,
} from '@crewplan/shared';

const daysOffProperty = {
  type: 'array',
  items: { type: 'integer', minimum: 1, maximum: 7 },
  maxItems: 7,
};

// JSON schema for POST /api/employees (create employee)
const createEmployeeSchema = {
  body: {
    type: 'object',
    required: ['name', 'position'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      position: { type: 'string', minLength: 1, maxLength: 100 },
      daysOff: daysOffProperty,
    },
    additionalProperties: false,
  },
};

// JSON schema for employee ID in path params
const employeeIdSchema = {
  params: {
    type: 'object',
    required: ['employeeId'],
    properties: {
      employeeId: { type: 'string' },
    },
  },
};

// JSON schema for PATCH /api/employees/:employeeId (update employee)
const updateEmployeeSchema = {
  body: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      position: { type: 'string', minLength: 1, maxLength: 100 },
      daysOff: daysOffProperty,
    },
    additionalProperties: false,
    minProperties: 1,
  },
  ...employeeIdSchema,
};

// JSON schema for GET /api/employees (list employees)
const listEmployeesSchema = {
  querystring: {
    type: 'object',
    properties: {
      position: { type: 'string', minLength: 1 },
    },
    additionalProperties: false,
  },
};

// JSON schema for GET /api/employees/:employeeId/availability
const availabilitySchema = {
  querystring: {
    type: 'object',
    required: ['date'],
    properties: {
      date: { type: 'string', format: 'date' },
    },
    additionalProperties: false,
  },
  ...employeeIdSchema,
};

export default async function employeeRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/employees
   * Lists employees by name, optionally filtered with ?position=.
   */
  fastify.get<{ Querystring: EmployeeListQuery }>(
    '/',
    { schema: listEmployeesSchema },
    async (request, reply) => {
      const response: EmployeeListResponse = {
        employees: employeeService.listEmployees(fastify.db, request.query),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/employees
   */
  fastify.post<{ Body: CreateEmployeeRequest }>(
    '/',
    { schema: createEmployeeSchema },
    async (request, reply) => {
      const employee = employeeService.createEmployee(fastify.db, request.body);
      return reply.status(201).send(employee);
    },
  );

  /**
   * GET /api/employees/:employeeId
   */
  fastify.get<{ Params: { employeeId: string } }>(
    '/:employeeId',
    { schema: employeeIdSchema },
    async (request, reply) => {
      const employee = employeeService.getEmployee(fastify.db, request.params.employeeId);
      return reply.status(200).send(employee);
    },
  );

  /**
   * PATCH /api/employees/:employeeId
   * Updates an employee. All fields are optional; at least one required.
   */
  fastify.patch<{ Params: { employeeId: string }; Body: UpdateEmployeeRequest }>(
    '/:employeeId',
    { schema: updateEmployeeSchema },
    async (request, reply) => {
      const employee = employeeService.updateEmployee(
        fastify.db,
        request.params.employeeId,
        request.body,
      );
      return reply.status(200).send(employee);
    },
  );

  /**
   * DELETE /api/employees/:employeeId
   * Deletes an employee. Their tasks become unassigned.
   */
  fastify.delete<{ Params: { employeeId: string } }>(
    '/:employeeId',
    { schema: employeeIdSchema },
    async (request, reply) => {
      employeeService.deleteEmployee(fastify.db, request.params.employeeId);
      return reply.status(204).send();
    },
  );

  /**
   * GET /api/employees/:employeeId/availability?date=YYYY-MM-DD
   * Whether the employee works on the given date.
   */
  fastify.get<{ Params: { employeeId: string }; Querystring: { date: string } }>(
    '/:employeeId/availability',
    { schema: availabilitySchema },
    async (request, reply) => {
      const { employeeId } = request.params;
      const { date } = request.query;
      const response: EmployeeAvailabilityResponse = {
        employeeId,
        date,
        available: employeeService.isEmployeeAvailable(fastify.db, employeeId, date),
      };
      return reply.status(200).send(response);
    },
  );
}
