import { randomUUID } from 'node:crypto';
import { eq, asc, desc, sql } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import type { RunResult } from 'better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import { projects, tasks } from '../db/schema.js';
import type { CreateProjectRequest, Project, ProjectSummary } from '@crewplan/shared';
import { NotFoundError, ValidationError } from '../errors/AppError.js';
import { isValidDate } from './scheduling/dateArithmetic.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

/** The database or an open transaction on it. */
export type Executor = BaseSQLiteDatabase<'sync', RunResult, typeof schemaTypes>;

/**
 * Convert a database project row to the Project shape.
 */
export function toProject(row: typeof projects.$inferSelect): Project {
  return {
    id: row.id,
    name: row.name,
    startDate: row.startDate,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Count all tasks of a project, subtasks included.
 */
function countTasks(db: DbType, projectId: string): number {
  const result = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(tasks)
    .where(eq(tasks.projectId, projectId))
    .get();
  return result?.count ?? 0;
}

/**
 * List all projects, newest first.
 */
export function listProjects(db: DbType): ProjectSummary[] {
  const rows = db
    .select()
    .from(projects)
    .orderBy(desc(projects.createdAt), asc(projects.name))
    .all();

  return rows.map((row) => ({ ...toProject(row), taskCount: countTasks(db, row.id) }));
}

/**
 * Get a single project.
 * @throws NotFoundError if project does not exist
 */
export function getProject(db: Executor, id: string): Project {
  const row = db.select().from(projects).where(eq(projects.id, id)).get();
  if (!row) {
    throw new NotFoundError('Project not found');
  }
  return toProject(row);
}

/**
 * Create a project.
 * @throws ValidationError if the name is blank or the start date is not a calendar date
 */
export function createProject(db: Executor, data: CreateProjectRequest): Project {
  const name = data.name.trim();
  if (name.length === 0) {
    throw new ValidationError('Project name must not be empty');
  }
  if (!isValidDate(data.startDate)) {
    throw new ValidationError('startDate must be an ISO 8601 date (YYYY-MM-DD)');
  }

  const now = new Date().toISOString();
  const id = randomUUID();

  db.insert(projects)
    .values({ id, name, startDate: data.startDate, createdAt: now, updatedAt: now })
    .run();

  return { id, name, startDate: data.startDate, createdAt: now, updatedAt: now };
}

/**
 * Delete a project together with all of its tasks.
 * @throws NotFoundError if project does not exist
 */
export function deleteProject(db: DbType, id: string): void {
  getProject(db, id);
  db.delete(projects).where(eq(projects.id, id)).run();
}
