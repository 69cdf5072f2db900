/**
 * Personnel assignment.
 *
 * Greedy and first-fit: tasks are visited by start date and each gets the least
 * loaded eligible person who can do it, moving the task forward in time when nobody
 * can do it on its current dates. No choice is revisited later.
 */

import type { DateRange } from '@crewplan/shared';
import { addDays, isAvailableOver, isoWeekday, minDate, searchForward } from './dateArithmetic.js';
import type { DateMappingPolicy } from './dateMapping.js';
import { cascadeFrom } from './dependencyCorrector.js';
import type { CorrectionContext } from './dependencyCorrector.js';
import type {
  PersonDirectory,
  ScheduleDiagnostics,
  SchedulingPerson,
  SchedulingTask,
} from './types.js';

/** Person ID -> assigned load in days. Owned by one scheduling run. */
export type WorkloadLedger = Map<string, number>;

export const DEFAULT_HORIZON_DAYS = 60;

export interface AllocationContext {
  directory: PersonDirectory;
  policy: DateMappingPolicy;
  correction: CorrectionContext;
  diagnostics: ScheduleDiagnostics;
  /** Candidate start dates tried by the forward window search. */
  horizonDays: number;
  workload: WorkloadLedger;
}

function isPersonAvailable(
  directory: PersonDirectory,
  person: SchedulingPerson,
  date: string,
): boolean {
  if (directory.isAvailable) {
    return directory.isAvailable(person.id, date);
  }
  return !person.daysOff.includes(isoWeekday(date));
}

/**
 * Dates the task would occupy if `person` did it starting from `start`, or null when
 * the person is unavailable on any day they would work on it.
 */
function fitFor(
  ctx: AllocationContext,
  task: SchedulingTask,
  person: SchedulingPerson,
  start: string,
): DateRange | null {
  const candidate: SchedulingTask = { ...task, employeeId: person.id };
  const range = ctx.policy.layoutFrom(start, candidate);
  if (!range) return null;

  const fits = isAvailableOver(
    range,
    (day) => !ctx.policy.worksOn(day, candidate) || isPersonAvailable(ctx.directory, person, day),
  );
  return fits ? range : null;
}

/** Least loaded first; equal loads keep directory order. */
function rankByLoad(ctx: AllocationContext, people: readonly SchedulingPerson[]): SchedulingPerson[] {
  return [...people].sort((a, b) => (ctx.workload.get(a.id) ?? 0) - (ctx.workload.get(b.id) ?? 0));
}

function commit(
  ctx: AllocationContext,
  task: SchedulingTask,
  person: SchedulingPerson,
  range: DateRange,
  dates: Map<string, DateRange>,
): void {
  task.employeeId = person.id;
  ctx.workload.set(person.id, (ctx.workload.get(person.id) ?? 0) + task.workingDuration);

  const previous = dates.get(task.id);
  dates.set(task.id, range);
  if (previous && (previous.start !== range.start || previous.end !== range.end)) {
    ctx.diagnostics.log.info(
      { taskId: task.id, personId: person.id, from: previous, to: range },
      'Task moved to fit assignee availability',
    );
    cascadeFrom(ctx.correction, task.id, dates);
  }
}

/**
 * Assign a person to one dated task, moving its dates when needed. Mutates the task's
 * `employeeId`, the ledger, and `dates`. Every failure is recorded as a warning.
 */
export function assignTask(
  ctx: AllocationContext,
  task: SchedulingTask,
  dates: Map<string, DateRange>,
): void {
  const current = dates.get(task.id);
  if (!current) return;

  // 1. Keep an existing assignment when that person can do the task as scheduled
  if (task.employeeId) {
    const assigned = ctx.directory.getPerson(task.employeeId);
    if (!assigned) {
      ctx.diagnostics.warn('unknown_person', task.id, `Assigned person ${task.employeeId} not found`, {
        personId: task.employeeId,
      });
    } else {
      const range = fitFor(ctx, task, assigned, current.start);
      if (range) {
        commit(ctx, task, assigned, range, dates);
        return;
      }
      if (!task.position) {
        ctx.diagnostics.warn(
          'person_unavailable',
          task.id,
          `${assigned.name} is unavailable ${current.start}..${current.end} and the task has no position to reassign by`,
          { personId: assigned.id },
        );
        return;
      }
      ctx.diagnostics.log.debug(
        { taskId: task.id, personId: assigned.id },
        'Assigned person unavailable; reassigning',
      );
    }
  }

  if (!task.position) return;

  // 2. Eligible people
  const candidates = ctx.directory.listByRole(task.position);
  if (candidates.length === 0) {
    ctx.diagnostics.warn('no_eligible_person', task.id, `No person holds position "${task.position}"`, {
      position: task.position,
    });
    return;
  }
  const ranked = rankByLoad(ctx, candidates);

  // 3. Someone free on the current dates
  for (const person of ranked) {
    const range = fitFor(ctx, task, person, current.start);
    if (range) {
      commit(ctx, task, person, range, dates);
      return;
    }
  }

  // 4. Nearest window after the current start
  for (const person of ranked) {
    const window = searchForward(current.start, ctx.horizonDays, (start) =>
      isPersonAvailable(ctx.directory, person, start) ? fitFor(ctx, task, person, start) : null,
    );
    if (window) {
      commit(ctx, task, person, window, dates);
      return;
    }
  }

  ctx.diagnostics.warn(
    'no_available_window',
    task.id,
    `Nobody holding "${task.position}" is available within ${ctx.horizonDays} days of ${current.start}`,
    { position: task.position, candidates: candidates.length },
  );
}

function needsAllocation(task: SchedulingTask): boolean {
  return !task.isGroup && (task.position !== null || task.employeeId !== null);
}

/**
 * Allocate every dated, non-group task that needs a person, earliest start first
 * (ties by input order). The next task is picked after each assignment, since a move
 * can cascade into tasks not yet visited.
 */
export function allocateResources(
  ctx: AllocationContext,
  tasks: readonly SchedulingTask[],
  dates: Map<string, DateRange>,
): void {
  const pending = tasks.filter((task) => needsAllocation(task) && dates.has(task.id));

  while (pending.length > 0) {
    let next = 0;
    for (let i = 1; i < pending.length; i++) {
      const candidate = dates.get(pending[i].id)?.start ?? '';
      const best = dates.get(pending[next].id)?.start ?? '';
      if (candidate < best) next = i;
    }
    const [task] = pending.splice(next, 1);
    assignTask(ctx, task, dates);
  }
}

export interface SubtaskLayoutContext {
  policy: DateMappingPolicy;
  diagnostics: ScheduleDiagnostics;
  /** Absent when no person directory was supplied; subtasks are then only laid out. */
  allocation: AllocationContext | null;
}

/**
 * Lay out the subtasks of each dated group task inside the group's window. Parallel
 * subtasks start with the group, sequential ones run back to back from the group's
 * start, in input order. Each subtask is allocated before its end is clipped to the
 * group's end. A subtask whose calendar yields no working days stays undated.
 */
export function layoutGroupSubtasks(
  ctx: SubtaskLayoutContext,
  groups: readonly SchedulingTask[],
  subtasksOf: ReadonlyMap<string, readonly SchedulingTask[]>,
  dates: Map<string, DateRange>,
): void {
  for (const group of groups) {
    const subtasks = subtasksOf.get(group.id) ?? [];
    if (subtasks.length === 0) continue;

    const groupDates = dates.get(group.id);
    if (!groupDates) {
      for (const subtask of subtasks) {
        ctx.diagnostics.warn(
          'unschedulable_dates',
          subtask.id,
          `Group ${group.id} has no dates; subtask left undated`,
          { groupId: group.id },
        );
      }
      continue;
    }

    let cursor = groupDates.start;
    for (const subtask of subtasks) {
      const start = subtask.parallel ? groupDates.start : cursor;
      const tentative = ctx.policy.layoutFrom(start, subtask);
      if (!tentative) {
        dates.delete(subtask.id);
        ctx.diagnostics.warn(
          'unschedulable_dates',
          subtask.id,
          'No working days found within the iteration cap; subtask left undated',
          { groupId: group.id, start, duration: subtask.duration, mode: ctx.policy.mode },
        );
        continue;
      }
      dates.set(subtask.id, tentative);

      if (ctx.allocation && needsAllocation(subtask)) {
        assignTask(ctx.allocation, subtask, dates);
      }

      const placed = dates.get(subtask.id) ?? tentative;
      const final =
        placed.start <= groupDates.end ? { start: placed.start, end: minDate(placed.end, groupDates.end) } : placed;
      dates.set(subtask.id, final);

      if (!subtask.parallel) {
        cursor = addDays(final.end, 1);
      }
    }
  }
}
