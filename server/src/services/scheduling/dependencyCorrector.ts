/**
 * Second pass over concrete dates: every task must start strictly after all of its
 * predecessors end. Calendar conversion (days off) and the allocator's window search
 * can both break that, so violations are repaired here by pushing tasks later and
 * cascading the move to their transitive successors.
 */

import type { DateRange } from '@crewplan/shared';
import { addDays, maxDate } from './dateArithmetic.js';
import type { DateMappingPolicy } from './dateMapping.js';
import type { ScheduleDiagnostics, SchedulingTask } from './types.js';

export interface CorrectionContext {
  tasks: ReadonlyMap<string, SchedulingTask>;
  /** Task ID -> resolved predecessor IDs. */
  dependencies: ReadonlyMap<string, readonly string[]>;
  /** Task ID -> IDs of tasks that list it as a predecessor. */
  dependents: ReadonlyMap<string, readonly string[]>;
  policy: DateMappingPolicy;
  diagnostics: ScheduleDiagnostics;
  /** Upper bound on shifts within one cascade. */
  maxShifts: number;
}

export function createCorrectionContext(
  tasks: readonly SchedulingTask[],
  dependencies: ReadonlyMap<string, readonly string[]>,
  policy: DateMappingPolicy,
  diagnostics: ScheduleDiagnostics,
): CorrectionContext {
  const dependents = new Map<string, string[]>();
  for (const task of tasks) {
    dependents.set(task.id, []);
  }
  for (const task of tasks) {
    for (const predId of dependencies.get(task.id) ?? []) {
      dependents.get(predId)?.push(task.id);
    }
  }

  return {
    tasks: new Map(tasks.map((task) => [task.id, task])),
    dependencies,
    dependents,
    policy,
    diagnostics,
    maxShifts: tasks.length * tasks.length + 1,
  };
}

/**
 * Kahn's algorithm over predecessor counts. Ready tasks are taken in input order.
 * Tasks still blocked when the queue empties (i.e. on a cycle) are appended in input
 * order instead of being dropped.
 */
export function orderByPredecessors(
  taskIds: readonly string[],
  dependencies: ReadonlyMap<string, readonly string[]>,
): string[] {
  const known = new Set(taskIds);
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const id of taskIds) {
    dependents.set(id, []);
  }
  for (const id of taskIds) {
    const preds = (dependencies.get(id) ?? []).filter((predId) => known.has(predId));
    inDegree.set(id, preds.length);
    for (const predId of preds) {
      dependents.get(predId)?.push(id);
    }
  }

  const queue = taskIds.filter((id) => inDegree.get(id) === 0);
  const ordered: string[] = [];
  const placed = new Set<string>();

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    ordered.push(id);
    placed.add(id);

    for (const depId of dependents.get(id) ?? []) {
      const remaining = (inDegree.get(depId) ?? 0) - 1;
      inDegree.set(depId, remaining);
      if (remaining === 0) {
        queue.push(depId);
      }
    }
  }

  for (const id of taskIds) {
    if (!placed.has(id)) ordered.push(id);
  }
  return ordered;
}

/**
 * Latest end date among the task's dated predecessors, or null when none has dates.
 */
function latestPredecessorEnd(
  ctx: CorrectionContext,
  taskId: string,
  dates: ReadonlyMap<string, DateRange>,
): string | null {
  let latest: string | null = null;
  for (const predId of ctx.dependencies.get(taskId) ?? []) {
    const predDates = dates.get(predId);
    if (!predDates) continue;
    latest = latest === null ? predDates.end : maxDate(latest, predDates.end);
  }
  return latest;
}

/**
 * Move one task past its predecessors if it starts on or before the latest of their
 * end dates. Returns true when the task was moved. A task that cannot be placed after
 * its predecessors loses its dates.
 */
function shiftIfViolated(
  ctx: CorrectionContext,
  taskId: string,
  dates: Map<string, DateRange>,
): boolean {
  const task = ctx.tasks.get(taskId);
  const current = dates.get(taskId);
  if (!task || !current) return false;

  const latestEnd = latestPredecessorEnd(ctx, taskId, dates);
  if (latestEnd === null || current.start > latestEnd) return false;

  const earliestStart = addDays(latestEnd, 1);
  const shifted = ctx.policy.layoutFrom(earliestStart, task);
  if (!shifted) {
    dates.delete(taskId);
    ctx.diagnostics.warn(
      'unschedulable_dates',
      taskId,
      `No working days found after ${latestEnd}; dates left undetermined`,
      { earliestStart, duration: task.duration, mode: ctx.policy.mode },
    );
    return false;
  }
  dates.set(taskId, shifted);

  ctx.diagnostics.log.debug(
    { taskId, from: current, to: shifted, latestPredecessorEnd: latestEnd },
    'Task shifted past its predecessors',
  );
  return true;
}

/**
 * Re-check every transitive successor of `taskId` after its dates changed, moving
 * each one that now violates its predecessors. Mutates `dates`.
 *
 * @returns Number of tasks moved.
 */
export function cascadeFrom(
  ctx: CorrectionContext,
  taskId: string,
  dates: Map<string, DateRange>,
): number {
  const worklist = [...(ctx.dependents.get(taskId) ?? [])];
  let shifts = 0;

  while (worklist.length > 0) {
    const id = worklist.shift();
    if (id === undefined) break;
    if (!shiftIfViolated(ctx, id, dates)) continue;

    shifts++;
    if (shifts >= ctx.maxShifts) {
      ctx.diagnostics.log.error({ taskId, shifts }, 'Date cascade did not settle; stopping');
      break;
    }
    worklist.push(...(ctx.dependents.get(id) ?? []));
  }

  return shifts;
}

/**
 * Repair every predecessor violation in a date map. The input is left untouched;
 * a consistent map comes back unchanged.
 */
export function correctDependencies(
  ctx: CorrectionContext,
  input: ReadonlyMap<string, DateRange>,
): Map<string, DateRange> {
  const dates = new Map(input);
  const order = orderByPredecessors([...ctx.tasks.keys()], ctx.dependencies);

  for (const taskId of order) {
    if (shiftIfViolated(ctx, taskId, dates)) {
      cascadeFrom(ctx, taskId, dates);
    }
  }

  return dates;
}
