/**
 * Scheduling Engine: Critical Path Method plus calendar mapping and personnel
 * assignment.
 *
 * `computeSchedule` is a pure function over plain data and a synchronous person
 * directory. No database access occurs here; persistence lives in scheduleService.
 *
 * Pipeline: normalize -> build graph -> cycle check -> solve earliest/latest times ->
 * map to dates -> correct dependencies -> allocate people -> lay out group subtasks.
 */

import pino from 'pino';
import type { DateRange, ScheduleResponse, Weekday } from '@crewplan/shared';
import { diffDays, maxDate, minDate } from './scheduling/dateArithmetic.js';
import { CORPORATE_DAYS_OFF, createDateMappingPolicy, mapTaskDates } from './scheduling/dateMapping.js';
import { correctDependencies, createCorrectionContext } from './scheduling/dependencyCorrector.js';
import { buildDependencyGraph, findCycle } from './scheduling/dependencyGraph.js';
import { solveLongestPath } from './scheduling/longestPath.js';
import { normalizeTasks } from './scheduling/normalize.js';
import {
  DEFAULT_HORIZON_DAYS,
  allocateResources,
  layoutGroupSubtasks,
} from './scheduling/resourceAllocator.js';
import type { AllocationContext } from './scheduling/resourceAllocator.js';
import { ScheduleDiagnostics } from './scheduling/types.js';
import type {
  PersonDirectory,
  RawSchedulingTask,
  SchedulingLogger,
  SchedulingProject,
  SchedulingTask,
} from './scheduling/types.js';

export interface ComputeScheduleOptions {
  /** Enables working-day mapping and personnel assignment. */
  directory?: PersonDirectory;
  /** Calendar for tasks without an assignee (or whose assignee has no days off). */
  defaultDaysOff?: readonly Weekday[];
  /** Candidate start dates tried when searching for an assignee's free window. */
  horizonDays?: number;
  logger?: SchedulingLogger;
}

const silentLogger: SchedulingLogger = pino({ level: 'silent' });

// ─── Helpers ──────────────────────────────────────────────────────────────────

function emptyResult(projectId: string, diagnostics: ScheduleDiagnostics): ScheduleResponse {
  return {
    projectId,
    duration: 0,
    workdayDuration: 0,
    criticalPath: [],
    taskDates: {},
    earlyTimes: [],
    lateTimes: [],
    slack: [],
    dependencies: {},
    assignments: {},
    workload: {},
    warnings: diagnostics.warnings,
    applied: false,
  };
}

/**
 * Calendar days from the earliest start to the latest end, inclusive. 0 without dates.
 */
export function calendarDuration(ranges: Iterable<DateRange>): number {
  let first: string | null = null;
  let last: string | null = null;
  for (const range of ranges) {
    first = first === null ? range.start : minDate(first, range.start);
    last = last === null ? range.end : maxDate(last, range.end);
  }
  return first === null || last === null ? 0 : diffDays(first, last) + 1;
}

/**
 * Split normalized tasks into graph tasks and the subtasks of group tasks.
 * Subtasks are keyed by their group's ID, in input order.
 */
function partitionSubtasks(tasks: readonly SchedulingTask[]): {
  topLevel: SchedulingTask[];
  subtasksOf: Map<string, SchedulingTask[]>;
} {
  const groupIds = new Set(tasks.filter((task) => task.isGroup).map((task) => task.id));
  const topLevel: SchedulingTask[] = [];
  const subtasksOf = new Map<string, SchedulingTask[]>();

  for (const task of tasks) {
    if (task.parentId !== null && groupIds.has(task.parentId)) {
      const siblings = subtasksOf.get(task.parentId) ?? [];
      siblings.push(task);
      subtasksOf.set(task.parentId, siblings);
    } else {
      topLevel.push(task);
    }
  }

  return { topLevel, subtasksOf };
}

// ─── Main entry point ─────────────────────────────────────────────────────────

/**
 * Compute the schedule of one project.
 *
 * Without a directory, time units are calendar days and nobody is assigned. With one,
 * time units are working days of each task's calendar and tasks needing a position
 * get people assigned (possibly moving their dates).
 *
 * Structural errors do not throw: a dependency cycle yields `error: 'cyclic_dependency'`
 * with the cycle's task IDs and no dates. Recovered problems are listed in `warnings`.
 * Input tasks are never mutated.
 */
export function computeSchedule(
  project: SchedulingProject,
  rawTasks: readonly RawSchedulingTask[],
  options: ComputeScheduleOptions = {},
): ScheduleResponse {
  const log = options.logger ?? silentLogger;
  const diagnostics = new ScheduleDiagnostics(log);
  const { directory } = options;

  const tasks = normalizeTasks(rawTasks, diagnostics);
  const { topLevel, subtasksOf } = partitionSubtasks(tasks);

  const graph = buildDependencyGraph(topLevel, diagnostics);
  if (!graph) {
    log.info({ projectId: project.id }, 'No schedulable tasks');
    return emptyResult(project.id, diagnostics);
  }

  const dependencies = Object.fromEntries(graph.dependencies);

  const cycle = findCycle(graph);
  if (cycle) {
    log.warn({ projectId: project.id, cycle }, 'Circular dependency detected; schedule not computed');
    return {
      ...emptyResult(project.id, diagnostics),
      error: 'cyclic_dependency',
      cycleTaskIds: cycle,
      dependencies,
    };
  }

  const solution = solveLongestPath(graph);
  const policy = createDateMappingPolicy(directory, options.defaultDaysOff ?? CORPORATE_DAYS_OFF);

  const mapped = mapTaskDates(
    project.startDate,
    topLevel,
    graph,
    solution.earliest,
    policy,
    diagnostics,
  );

  const correction = createCorrectionContext(topLevel, graph.dependencies, policy, diagnostics);
  const dates = correctDependencies(correction, mapped);

  const originalAssignees = new Map(tasks.map((task) => [task.id, task.employeeId]));
  let allocation: AllocationContext | null = null;
  if (directory) {
    allocation = {
      directory,
      policy,
      correction,
      diagnostics,
      horizonDays: options.horizonDays ?? DEFAULT_HORIZON_DAYS,
      workload: new Map(),
    };
    allocateResources(allocation, topLevel, dates);
  }

  layoutGroupSubtasks(
    { policy, diagnostics, allocation },
    topLevel.filter((task) => task.isGroup),
    subtasksOf,
    dates,
  );

  const taskDates: Record<string, DateRange> = {};
  const assignments: Record<string, string> = {};
  for (const task of tasks) {
    const range = dates.get(task.id);
    if (range) taskDates[task.id] = range;
    if (task.employeeId !== null && task.employeeId !== originalAssignees.get(task.id)) {
      assignments[task.id] = task.employeeId;
    }
  }

  const result: ScheduleResponse = {
    projectId: project.id,
    duration: calendarDuration(dates.values()),
    workdayDuration: solution.earliest[graph.sink],
    criticalPath: solution.criticalTaskIds,
    taskDates,
    earlyTimes: solution.earliest,
    lateTimes: solution.latest,
    slack: solution.slack,
    dependencies,
    assignments,
    workload: allocation ? Object.fromEntries(allocation.workload) : {},
    warnings: diagnostics.warnings,
    applied: false,
  };

  log.info(
    {
      projectId: project.id,
      mode: policy.mode,
      tasks: tasks.length,
      duration: result.duration,
      criticalPath: result.criticalPath,
      warnings: result.warnings.length,
    },
    'Schedule computed',
  );

  return result;
}
