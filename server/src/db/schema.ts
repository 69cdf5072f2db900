/**
 * Drizzle ORM schema definitions.
 *
 * Must stay in sync with the SQL files under ./migrations, which are what actually
 * create the tables.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';

/**
 * Projects table - one schedulable project with a calendar start date.
 */
export const projects = sqliteTable(
  'projects',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    startDate: text('start_date').notNull(),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    createdAtIdx: index('idx_projects_created_at').on(table.createdAt),
  }),
);

/**
 * Employees table - assignable people. `days_off` holds a JSON array of ISO weekdays
 * (Monday = 1 ... Sunday = 7).
 */
export const employees = sqliteTable(
  'employees',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    position: text('position').notNull(),
    daysOff: text('days_off').notNull().default('[]'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    positionIdx: index('idx_employees_position').on(table.position),
  }),
);

/**
 * Tasks table - project tasks, two levels deep (group tasks own subtasks via parent_id).
 * `predecessors` holds a JSON array of task IDs in the same project.
 */
export const tasks = sqliteTable(
  'tasks',
  {
    id: text('id').primaryKey(),
    projectId: text('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    parentId: text('parent_id').references((): AnySQLiteColumn => tasks.id, {
      onDelete: 'cascade',
    }),
    name: text('name').notNull(),
    duration: integer('duration').notNull(),
    workingDuration: integer('working_duration'),
    isGroup: integer('is_group', { mode: 'boolean' }).notNull().default(false),
    parallel: integer('parallel', { mode: 'boolean' }).notNull().default(false),
    position: text('position'),
    employeeId: text('employee_id').references(() => employees.id, { onDelete: 'set null' }),
    predecessors: text('predecessors').notNull().default('[]'),
    startDate: text('start_date'),
    endDate: text('end_date'),
    sortOrder: integer('sort_order').notNull().default(0),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    projectIdIdx: index('idx_tasks_project_id').on(table.projectId),
    parentIdIdx: index('idx_tasks_parent_id').on(table.parentId),
    employeeIdIdx: index('idx_tasks_employee_id').on(table.employeeId),
  }),
);
