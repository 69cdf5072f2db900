import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import type { ScheduleResponse, Weekday } from '@crewplan/shared';
import { computeSchedule } from './schedulingEngine.js';
import type { SchedulingLogger } from './scheduling/types.js';
import { createPersonDirectory } from './employeeService.js';
import { getProject } from './projectService.js';
import { assignPerson, listSchedulingTasks, updateTaskDates } from './taskService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

export interface RunScheduleOptions {
  /** Write dates and new assignments back. Default: false. */
  apply?: boolean;
  /** Use per-person days off and assign people. Default: true. */
  daysOffAware?: boolean;
  defaultDaysOff?: readonly Weekday[];
  horizonDays?: number;
  logger?: SchedulingLogger;
}

/**
 * Compute the schedule of a stored project and optionally persist it.
 *
 * Persistence happens only after the whole computation succeeded, in one transaction,
 * and never for a result carrying a structural error.
 * @throws NotFoundError if project does not exist
 */
export function runSchedule(
  db: DbType,
  projectId: string,
  options: RunScheduleOptions = {},
): ScheduleResponse {
  const project = getProject(db, projectId);
  const rawTasks = listSchedulingTasks(db, projectId);
  const directory = options.daysOffAware === false ? undefined : createPersonDirectory(db);

  const result = computeSchedule(project, rawTasks, {
    directory,
    defaultDaysOff: options.defaultDaysOff,
    horizonDays: options.horizonDays,
    logger: options.logger,
  });

  if (!options.apply || result.error !== undefined) {
    return result;
  }

  // Tasks left undated lose the dates of an earlier run
  const cleared = rawTasks.flatMap((task) =>
    task.id && task.startDate && !(task.id in result.taskDates) ? [task.id] : [],
  );

  db.transaction((tx) => {
    for (const [taskId, range] of Object.entries(result.taskDates)) {
      updateTaskDates(tx, taskId, range);
    }
    for (const taskId of cleared) {
      updateTaskDates(tx, taskId, null);
    }
    for (const [taskId, employeeId] of Object.entries(result.assignments)) {
      assignPerson(tx, taskId, employeeId);
    }
  });

  options.logger?.info(
    {
      projectId,
      datedTasks: Object.keys(result.taskDates).length,
      clearedTasks: cleared.length,
      assignments: Object.keys(result.assignments).length,
    },
    'Schedule applied',
  );

  return { ...result, applied: true };
}
