import { randomUUID } from 'node:crypto';
import { eq, and, asc, isNull, isNotNull, sql } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { employees, tasks } from '../db/schema.js';
import type {
  CreateSubtaskRequest,
  CreateTaskRequest,
  DateRange,
  Task,
  TaskDetail,
  TaskListQuery,
  UpdateTaskRequest,
} from '@crewplan/shared';
import { CircularDependencyError, NotFoundError, ValidationError } from '../errors/AppError.js';
import { decodePredecessors } from './scheduling/normalize.js';
import type { RawSchedulingTask } from './scheduling/types.js';
import { getProject } from './projectService.js';
import type { Executor } from './projectService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

type TaskRow = typeof tasks.$inferSelect;

/**
 * Convert a database task row to the Task shape.
 */
export function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    projectId: row.projectId,
    parentId: row.parentId,
    name: row.name,
    duration: row.duration,
    workingDuration: row.workingDuration ?? row.duration,
    isGroup: row.isGroup,
    parallel: row.parallel,
    position: row.position,
    employeeId: row.employeeId,
    predecessors: decodePredecessors(row.predecessors).ids,
    startDate: row.startDate,
    endDate: row.endDate,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Fetch a task row.
 * @throws NotFoundError if task does not exist
 */
function getTaskRow(db: Executor, id: string): TaskRow {
  const row = db.select().from(tasks).where(eq(tasks.id, id)).get();
  if (!row) {
    throw new NotFoundError('Task not found');
  }
  return row;
}

function nextSortOrder(db: Executor, projectId: string): number {
  const result = db
    .select({ maxOrder: sql<number>`COALESCE(MAX(${tasks.sortOrder}), -1)` })
    .from(tasks)
    .where(eq(tasks.projectId, projectId))
    .get();
  return (result?.maxOrder ?? -1) + 1;
}

// ─── Validation ───────────────────────────────────────────────────────────────

function validateName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Task name must not be empty');
  }
  return trimmed;
}

function validateDuration(value: number | undefined, field = 'duration'): number {
  if (value === undefined) {
    throw new ValidationError(`${field} is required`);
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`);
  }
  return value;
}

function validateWorkingDuration(value: number | null | undefined): number | null {
  if (value === undefined || value === null) return null;
  return validateDuration(value, 'workingDuration');
}

function normalizePosition(position: string | null | undefined): string | null {
  if (position === undefined || position === null) return null;
  const trimmed = position.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * @throws NotFoundError if the employee does not exist
 */
function ensureEmployeeExists(db: Executor, employeeId: string): void {
  const row = db
    .select({ id: employees.id })
    .from(employees)
    .where(eq(employees.id, employeeId))
    .get();
  if (!row) {
    throw new NotFoundError('Employee not found');
  }
}

/**
 * Predecessors must be distinct top-level tasks of the same project, other than the
 * task itself.
 * @throws ValidationError if any reference is invalid
 */
function validatePredecessors(
  db: Executor,
  projectId: string,
  taskId: string | null,
  predecessors: readonly string[],
): string[] {
  const ids = decodePredecessors(predecessors).ids;
  for (const id of ids) {
    if (id === taskId) {
      throw new ValidationError('A task cannot be its own predecessor');
    }
    const row = db.select().from(tasks).where(eq(tasks.id, id)).get();
    if (!row || row.projectId !== projectId) {
      throw new ValidationError(`Predecessor ${id} is not a task of this project`);
    }
    if (row.parentId !== null) {
      throw new ValidationError(
        `Predecessor ${id} is a subtask; only top-level tasks can be predecessors`,
      );
    }
  }
  return ids;
}

/**
 * Look for a path from one of the proposed predecessors back to the task, following
 * the stored predecessor lists of the project.
 *
 * @returns The cycle as task IDs (starting and ending at the task), or null
 */
function detectCycle(
  db: Executor,
  projectId: string,
  taskId: string,
  proposed: readonly string[],
): string[] | null {
  const rows = db
    .select({ id: tasks.id, predecessors: tasks.predecessors })
    .from(tasks)
    .where(and(eq(tasks.projectId, projectId), isNull(tasks.parentId)))
    .all();
  const predecessorsOf = new Map(
    rows.map((row) => [row.id, decodePredecessors(row.predecessors).ids]),
  );
  predecessorsOf.set(taskId, [...proposed]);

  const visited = new Set<string>([taskId]);
  // Each frame: [task ID, index of the next predecessor to follow]
  const stack: Array<[string, number]> = [[taskId, 0]];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const [currentId, index] = frame;
    const predecessors = predecessorsOf.get(currentId) ?? [];
    if (index >= predecessors.length) {
      stack.pop();
      continue;
    }

    frame[1] = index + 1;
    const predId = predecessors[index];
    if (predId === taskId) {
      return [...stack.map(([id]) => id), taskId];
    }
    if (!visited.has(predId)) {
      visited.add(predId);
      stack.push([predId, 0]);
    }
  }

  return null;
}

/**
 * Group duration from its subtasks: the longest when any runs in parallel, otherwise
 * the sum.
 */
export function deriveGroupDuration(
  subtasks: readonly { duration: number; parallel: boolean }[],
): number {
  if (subtasks.some((subtask) => subtask.parallel)) {
    return Math.max(...subtasks.map((subtask) => subtask.duration));
  }
  return subtasks.reduce((total, subtask) => total + subtask.duration, 0);
}

function recomputeGroupDuration(db: Executor, groupId: string, now: string): void {
  const subtasks = db
    .select({ duration: tasks.duration, parallel: tasks.parallel })
    .from(tasks)
    .where(eq(tasks.parentId, groupId))
    .all();
  if (subtasks.length === 0) return;

  db.update(tasks)
    .set({ duration: deriveGroupDuration(subtasks), updatedAt: now })
    .where(eq(tasks.id, groupId))
    .run();
}

// ─── Queries ──────────────────────────────────────────────────────────────────

/**
 * List the tasks of a project in display order. Subtasks are left out unless asked for.
 * @throws NotFoundError if project does not exist
 */
export function listTasks(db: DbType, projectId: string, query: TaskListQuery = {}): Task[] {
  getProject(db, projectId);

  const where = query.includeSubtasks
    ? eq(tasks.projectId, projectId)
    : and(eq(tasks.projectId, projectId), isNull(tasks.parentId));

  return db
    .select()
    .from(tasks)
    .where(where)
    .orderBy(asc(tasks.sortOrder), asc(tasks.id))
    .all()
    .map(toTask);
}

/**
 * Subtasks of a task in display order.
 * @throws NotFoundError if task does not exist
 */
export function getSubtasks(db: Executor, taskId: string): Task[] {
  getTaskRow(db, taskId);
  return db
    .select()
    .from(tasks)
    .where(eq(tasks.parentId, taskId))
    .orderBy(asc(tasks.sortOrder), asc(tasks.id))
    .all()
    .map(toTask);
}

/**
 * Get a task together with its subtasks.
 * @throws NotFoundError if task does not exist
 */
export function getTask(db: Executor, id: string): TaskDetail {
  const row = getTaskRow(db, id);
  return { ...toTask(row), subtasks: getSubtasks(db, id) };
}

/**
 * Tasks of a project in the form the scheduling engine consumes: top-level tasks
 * first, then subtasks, each in display order. Predecessors stay in stored form.
 */
export function listSchedulingTasks(db: DbType, projectId: string): RawSchedulingTask[] {
  const toRaw = (row: TaskRow): RawSchedulingTask => ({
    id: row.id,
    name: row.name,
    duration: row.duration,
    workingDuration: row.workingDuration,
    isGroup: row.isGroup,
    parallel: row.parallel,
    parentId: row.parentId,
    employeeId: row.employeeId,
    position: row.position,
    predecessors: row.predecessors,
    startDate: row.startDate,
    endDate: row.endDate,
  });

  const topLevel = db
    .select()
    .from(tasks)
    .where(and(eq(tasks.projectId, projectId), isNull(tasks.parentId)))
    .orderBy(asc(tasks.sortOrder), asc(tasks.id))
    .all();
  const subtasks = db
    .select()
    .from(tasks)
    .where(and(eq(tasks.projectId, projectId), isNotNull(tasks.parentId)))
    .orderBy(asc(tasks.sortOrder), asc(tasks.id))
    .all();

  return [...topLevel, ...subtasks].map(toRaw);
}

// ─── Mutations ────────────────────────────────────────────────────────────────

/**
 * Create a task. A group task may bring its subtasks inline; its duration is then
 * derived from them.
 * @throws NotFoundError if project or employee does not exist
 * @throws ValidationError if a field is invalid or a predecessor is not a top-level
 *   task of the project
 */
export function createTask(db: Executor, projectId: string, data: CreateTaskRequest): TaskDetail {
  getProject(db, projectId);

  const name = validateName(data.name);
  const subtaskData: CreateSubtaskRequest[] = data.subtasks ?? [];
  const isGroup = data.isGroup ?? subtaskData.length > 0;
  if (!isGroup && subtaskData.length > 0) {
    throw new ValidationError('Only group tasks can have subtasks');
  }

  const subtasks = subtaskData.map((subtask) => ({
    name: validateName(subtask.name),
    duration: validateDuration(subtask.duration),
    workingDuration: validateWorkingDuration(subtask.workingDuration),
    position: normalizePosition(subtask.position),
    parallel: subtask.parallel ?? false,
  }));
  const duration =
    subtasks.length > 0 ? deriveGroupDuration(subtasks) : validateDuration(data.duration);

  const employeeId = data.employeeId ?? null;
  if (employeeId !== null) {
    ensureEmployeeExists(db, employeeId);
  }
  const predecessors = validatePredecessors(db, projectId, null, data.predecessors ?? []);

  const id = randomUUID();
  const now = new Date().toISOString();

  db.transaction((tx) => {
    let sortOrder = nextSortOrder(tx, projectId);
    tx.insert(tasks)
      .values({
        id,
        projectId,
        parentId: null,
        name,
        duration,
        workingDuration: validateWorkingDuration(data.workingDuration),
        isGroup,
        parallel: false,
        position: normalizePosition(data.position),
        employeeId,
        predecessors: JSON.stringify(predecessors),
        sortOrder,
        createdAt: now,
        updatedAt: now,
      })
      .run();

    for (const subtask of subtasks) {
      sortOrder += 1;
      tx.insert(tasks)
        .values({
          id: randomUUID(),
          projectId,
          parentId: id,
          ...subtask,
          isGroup: false,
          predecessors: '[]',
          sortOrder,
          createdAt: now,
          updatedAt: now,
        })
        .run();
    }
  });

  return getTask(db, id);
}

/**
 * Add a subtask to an existing group task and refresh the group's duration.
 * @throws NotFoundError if the group does not exist
 * @throws ValidationError if the parent is not a group task or a field is invalid
 */
export function createSubtask(db: DbType, groupId: string, data: CreateSubtaskRequest): Task {
  const group = getTaskRow(db, groupId);
  if (!group.isGroup) {
    throw new ValidationError('Subtasks can only be added to group tasks');
  }

  const id = randomUUID();
  const now = new Date().toISOString();
  const values = {
    name: validateName(data.name),
    duration: validateDuration(data.duration),
    workingDuration: validateWorkingDuration(data.workingDuration),
    position: normalizePosition(data.position),
    parallel: data.parallel ?? false,
  };

  db.transaction((tx) => {
    tx.insert(tasks)
      .values({
        id,
        projectId: group.projectId,
        parentId: groupId,
        ...values,
        isGroup: false,
        predecessors: '[]',
        sortOrder: nextSortOrder(tx, group.projectId),
        createdAt: now,
        updatedAt: now,
      })
      .run();
    recomputeGroupDuration(tx, groupId, now);
  });

  return toTask(getTaskRow(db, id));
}

/**
 * Update a task. Only the provided fields change.
 * @throws NotFoundError if task or employee does not exist
 * @throws ValidationError if no fields are provided or a field is invalid
 * @throws CircularDependencyError if the new predecessors would close a cycle
 */
export function updateTask(db: Executor, id: string, data: UpdateTaskRequest): TaskDetail {
  const row = getTaskRow(db, id);

  const hasUpdates = Object.values(data).some((value) => value !== undefined);
  if (!hasUpdates) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof tasks.$inferInsert> = {};

  if (data.name !== undefined) {
    updates.name = validateName(data.name);
  }
  if (data.duration !== undefined) {
    if (row.isGroup && getSubtasks(db, id).length > 0) {
      throw new ValidationError('The duration of a group task is derived from its subtasks');
    }
    updates.duration = validateDuration(data.duration);
  }
  if (data.workingDuration !== undefined) {
    updates.workingDuration = validateWorkingDuration(data.workingDuration);
  }
  if (data.parallel !== undefined) {
    if (row.parentId === null) {
      throw new ValidationError('Only subtasks can run in parallel');
    }
    updates.parallel = data.parallel;
  }
  if (data.position !== undefined) {
    updates.position = normalizePosition(data.position);
  }
  if (data.employeeId !== undefined) {
    if (data.employeeId !== null) {
      ensureEmployeeExists(db, data.employeeId);
    }
    updates.employeeId = data.employeeId;
  }
  if (data.predecessors !== undefined) {
    if (row.parentId !== null && data.predecessors.length > 0) {
      throw new ValidationError('Subtasks cannot have predecessors');
    }
    const predecessors = validatePredecessors(db, row.projectId, id, data.predecessors);
    const cycle = detectCycle(db, row.projectId, id, predecessors);
    if (cycle) {
      throw new CircularDependencyError(
        'The new predecessors would create a circular dependency',
        { cycle },
      );
    }
    updates.predecessors = JSON.stringify(predecessors);
  }

  const now = new Date().toISOString();
  updates.updatedAt = now;

  db.transaction((tx) => {
    tx.update(tasks).set(updates).where(eq(tasks.id, id)).run();
    if (row.parentId !== null) {
      recomputeGroupDuration(tx, row.parentId, now);
    }
  });

  return getTask(db, id);
}

/**
 * Delete a task (and its subtasks). References to it are removed from other tasks'
 * predecessor lists; a parent group's duration is refreshed.
 * @throws NotFoundError if task does not exist
 */
export function deleteTask(db: DbType, id: string): void {
  const row = getTaskRow(db, id);
  const now = new Date().toISOString();

  db.transaction((tx) => {
    const dependents = tx
      .select({ id: tasks.id, predecessors: tasks.predecessors })
      .from(tasks)
      .where(eq(tasks.projectId, row.projectId))
      .all()
      .filter((task) => decodePredecessors(task.predecessors).ids.includes(id));

    for (const dependent of dependents) {
      const remaining = decodePredecessors(dependent.predecessors).ids.filter(
        (predId) => predId !== id,
      );
      tx.update(tasks)
        .set({ predecessors: JSON.stringify(remaining), updatedAt: now })
        .where(eq(tasks.id, dependent.id))
        .run();
    }

    tx.delete(tasks).where(eq(tasks.id, id)).run();
    if (row.parentId !== null) {
      recomputeGroupDuration(tx, row.parentId, now);
    }
  });
}

/**
 * Store computed dates, or clear them with null.
 * @returns false when the task does not exist
 */
export function updateTaskDates(db: Executor, id: string, range: DateRange | null): boolean {
  const result = db
    .update(tasks)
    .set({
      startDate: range?.start ?? null,
      endDate: range?.end ?? null,
      updatedAt: new Date().toISOString(),
    })
    .where(eq(tasks.id, id))
    .run();
  return result.changes > 0;
}

/**
 * Store an assignee, or clear it with null.
 * @returns false when the task does not exist
 */
export function assignPerson(db: Executor, id: string, employeeId: string | null): boolean {
  const result = db
    .update(tasks)
    .set({ employeeId, updatedAt: new Date().toISOString() })
    .where(eq(tasks.id, id))
    .run();
  return result.changes > 0;
}
