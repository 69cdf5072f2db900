import { randomUUID } from 'node:crypto';
import { eq, asc, and, isNotNull } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { employees, tasks } from '../db/schema.js';
import type {
  CreateEmployeeRequest,
  Employee,
  EmployeeListQuery,
  EmployeeWorkload,
  UpdateEmployeeRequest,
  Weekday,
  WorkloadPositionGroup,
  WorkloadResponse,
  WorkloadTask,
} from '@crewplan/shared';
import { NotFoundError, ValidationError } from '../errors/AppError.js';
import { isValidDate, isoWeekday } from './scheduling/dateArithmetic.js';
import { decodeWeekdays } from './scheduling/normalize.js';
import type { PersonDirectory, SchedulingPerson } from './scheduling/types.js';
import { getProject } from './projectService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

type EmployeeRow = typeof employees.$inferSelect;

/**
 * Convert a database employee row to the Employee shape.
 */
export function toEmployee(row: EmployeeRow): Employee {
  return {
    id: row.id,
    name: row.name,
    position: row.position,
    daysOff: decodeWeekdays(row.daysOff),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function validateName(name: string, field: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} must not be empty`);
  }
  return trimmed;
}

function validateDaysOff(daysOff: readonly Weekday[]): Weekday[] {
  const decoded = decodeWeekdays(daysOff);
  if (decoded.length !== new Set(daysOff).size) {
    throw new ValidationError('daysOff must contain ISO weekdays 1-7');
  }
  if (decoded.length === 7) {
    throw new ValidationError('daysOff must leave at least one working day');
  }
  return decoded;
}

/**
 * List employees ordered by name, optionally restricted to one position.
 */
export function listEmployees(db: DbType, query: EmployeeListQuery = {}): Employee[] {
  const where = query.position !== undefined ? eq(employees.position, query.position) : undefined;
  return db
    .select()
    .from(employees)
    .where(where)
    .orderBy(asc(employees.name), asc(employees.id))
    .all()
    .map(toEmployee);
}

/**
 * Get a single employee.
 * @throws NotFoundError if employee does not exist
 */
export function getEmployee(db: DbType, id: string): Employee {
  const row = db.select().from(employees).where(eq(employees.id, id)).get();
  if (!row) {
    throw new NotFoundError('Employee not found');
  }
  return toEmployee(row);
}

/**
 * Create an employee.
 * @throws ValidationError if name or position is blank, or daysOff is invalid
 */
export function createEmployee(db: DbType, data: CreateEmployeeRequest): Employee {
  const name = validateName(data.name, 'Employee name');
  const position = validateName(data.position, 'Position');
  const daysOff = validateDaysOff(data.daysOff ?? []);

  const now = new Date().toISOString();
  const id = randomUUID();

  db.insert(employees)
    .values({
      id,
      name,
      position,
      daysOff: JSON.stringify(daysOff),
      createdAt: now,
      updatedAt: now,
    })
    .run();

  return { id, name, position, daysOff, createdAt: now, updatedAt: now };
}

/**
 * Update an employee. Only the provided fields change.
 * @throws NotFoundError if employee does not exist
 * @throws ValidationError if no fields are provided or a field is invalid
 */
export function updateEmployee(db: DbType, id: string, data: UpdateEmployeeRequest): Employee {
  getEmployee(db, id);

  if (data.name === undefined && data.position === undefined && data.daysOff === undefined) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof employees.$inferInsert> = {
    updatedAt: new Date().toISOString(),
  };
  if (data.name !== undefined) {
    updates.name = validateName(data.name, 'Employee name');
  }
  if (data.position !== undefined) {
    updates.position = validateName(data.position, 'Position');
  }
  if (data.daysOff !== undefined) {
    updates.daysOff = JSON.stringify(validateDaysOff(data.daysOff));
  }

  db.update(employees).set(updates).where(eq(employees.id, id)).run();
  return getEmployee(db, id);
}

/**
 * Delete an employee. Their tasks become unassigned.
 * @throws NotFoundError if employee does not exist
 */
export function deleteEmployee(db: DbType, id: string): void {
  getEmployee(db, id);
  db.delete(employees).where(eq(employees.id, id)).run();
}

/**
 * Whether the employee works on the given date (not one of their weekly days off).
 * @throws NotFoundError if employee does not exist
 * @throws ValidationError if the date is not a calendar date
 */
export function isEmployeeAvailable(db: DbType, id: string, date: string): boolean {
  if (!isValidDate(date)) {
    throw new ValidationError('date must be an ISO 8601 date (YYYY-MM-DD)');
  }
  const employee = getEmployee(db, id);
  return !employee.daysOff.includes(isoWeekday(date));
}

/**
 * Snapshot of the employees table as a person directory for one scheduling run.
 * People are listed by name, then ID.
 */
export function createPersonDirectory(db: DbType): PersonDirectory {
  const people: SchedulingPerson[] = listEmployees(db).map((employee) => ({
    id: employee.id,
    name: employee.name,
    position: employee.position,
    daysOff: employee.daysOff,
  }));
  const byId = new Map(people.map((person) => [person.id, person]));

  return {
    listByRole: (role) => people.filter((person) => person.position === role),
    getPerson: (id) => byId.get(id),
    isAvailable: (personId, date) => {
      const person = byId.get(personId);
      return person !== undefined && !person.daysOff.includes(isoWeekday(date));
    },
  };
}

// ─── Workload ─────────────────────────────────────────────────────────────────

/**
 * Load in days: dated tasks are grouped by start date; within one start date the
 * parallel tasks count as their longest and the others add up. Undated tasks add up.
 */
export function computeLoadDays(workloadTasks: readonly WorkloadTask[]): number {
  const byStart = new Map<string, { parallelMax: number; sequential: number }>();
  let undated = 0;

  for (const task of workloadTasks) {
    if (task.startDate === null) {
      undated += task.workingDuration;
      continue;
    }
    const bucket = byStart.get(task.startDate) ?? { parallelMax: 0, sequential: 0 };
    if (task.parallel) {
      bucket.parallelMax = Math.max(bucket.parallelMax, task.workingDuration);
    } else {
      bucket.sequential += task.workingDuration;
    }
    byStart.set(task.startDate, bucket);
  }

  let total = undated;
  for (const bucket of byStart.values()) {
    total += bucket.parallelMax + bucket.sequential;
  }
  return total;
}

/**
 * Per-employee workload of one project, grouped by position (alphabetical).
 * Only employees with at least one assigned task are listed.
 * @throws NotFoundError if project does not exist
 */
export function getEmployeeWorkload(db: DbType, projectId: string): WorkloadResponse {
  getProject(db, projectId);

  const projectTasks = db.select().from(tasks).where(eq(tasks.projectId, projectId)).all();
  const namesById = new Map(projectTasks.map((task) => [task.id, task.name]));

  const assigned = db
    .select()
    .from(tasks)
    .where(and(eq(tasks.projectId, projectId), isNotNull(tasks.employeeId)))
    .orderBy(asc(tasks.startDate), asc(tasks.sortOrder))
    .all();

  const tasksByEmployee = new Map<string, WorkloadTask[]>();
  for (const row of assigned) {
    if (row.employeeId === null) continue;
    const groupName = row.parentId !== null ? namesById.get(row.parentId) : undefined;
    const entry: WorkloadTask = {
      id: row.id,
      name: groupName !== undefined ? `${groupName} - ${row.name}` : row.name,
      startDate: row.startDate,
      endDate: row.endDate,
      duration: row.duration,
      workingDuration: row.workingDuration ?? row.duration,
      parallel: row.parallel,
    };
    const list = tasksByEmployee.get(row.employeeId) ?? [];
    list.push(entry);
    tasksByEmployee.set(row.employeeId, list);
  }

  const groups = new Map<string, EmployeeWorkload[]>();
  for (const employee of listEmployees(db)) {
    const employeeTasks = tasksByEmployee.get(employee.id);
    if (!employeeTasks) continue;
    const list = groups.get(employee.position) ?? [];
    list.push({
      employeeId: employee.id,
      name: employee.name,
      position: employee.position,
      loadDays: computeLoadDays(employeeTasks),
      tasks: employeeTasks,
    });
    groups.set(employee.position, list);
  }

  const positions: WorkloadPositionGroup[] = [...groups.keys()]
    .sort((a, b) => a.localeCompare(b))
    .map((position) => ({ position, employees: groups.get(position) ?? [] }));

  return { projectId, positions };
}
