/**
 * Calendar mapping: abstract time units since project start -> concrete dates.
 *
 * Two strategies share one interface. `CalendarDayPolicy` treats a time unit as a
 * calendar day. `WorkingDayPolicy` treats it as a working day of the task's calendar:
 * the assigned person's weekly days off, or the corporate default when the task has
 * nobody (or nobody with a non-empty set). Durations are inclusive in both.
 */

import type { DateRange, Weekday } from '@crewplan/shared';
import { addDays, addWorkingDays, isWorkingDay, skipWorkingDays } from './dateArithmetic.js';
import type { DependencyGraph } from './dependencyGraph.js';
import type { PersonDirectory, ScheduleDiagnostics, SchedulingTask } from './types.js';

export const CORPORATE_DAYS_OFF: readonly Weekday[] = [6, 7];

/** Calendar days walked per time unit before a placement gives up. */
const DAYS_PER_UNIT_CAP = 7;

export interface DateMappingPolicy {
  readonly mode: 'calendar' | 'working_days';
  /**
   * Dates for a task whose earliest start is `offset` time units after `projectStart`.
   * null when the task cannot be placed (e.g. a calendar without working days).
   */
  place(projectStart: string, offset: number, task: SchedulingTask): DateRange | null;
  /** Dates for a task starting no earlier than `earliestStart`. */
  layoutFrom(earliestStart: string, task: SchedulingTask): DateRange | null;
  /** true when `date` counts towards the task's duration. */
  worksOn(date: string, task: SchedulingTask): boolean;
}

export class CalendarDayPolicy implements DateMappingPolicy {
  readonly mode = 'calendar';

  place(projectStart: string, offset: number, task: SchedulingTask): DateRange {
    return this.layoutFrom(addDays(projectStart, offset), task);
  }

  layoutFrom(earliestStart: string, task: SchedulingTask): DateRange {
    return { start: earliestStart, end: addDays(earliestStart, task.duration - 1) };
  }

  worksOn(): boolean {
    return true;
  }
}

export class WorkingDayPolicy implements DateMappingPolicy {
  readonly mode = 'working_days';
  private readonly defaultDaysOff: ReadonlySet<Weekday>;

  constructor(
    private readonly directory: PersonDirectory,
    defaultDaysOff: readonly Weekday[] = CORPORATE_DAYS_OFF,
  ) {
    this.defaultDaysOff = new Set(defaultDaysOff);
  }

  /**
   * Weekly non-working days that apply to a task.
   */
  daysOffFor(task: SchedulingTask): ReadonlySet<Weekday> {
    if (task.employeeId) {
      const person = this.directory.getPerson(task.employeeId);
      if (person && person.daysOff.length > 0) {
        return new Set(person.daysOff);
      }
    }
    return this.defaultDaysOff;
  }

  place(projectStart: string, offset: number, task: SchedulingTask): DateRange | null {
    const daysOff = this.daysOffFor(task);
    const cap = iterationCap(offset + task.duration);
    const start = skipWorkingDays(projectStart, offset, daysOff, cap);
    if (start === null) return null;
    return this.layoutWithin(start, task, daysOff);
  }

  layoutFrom(earliestStart: string, task: SchedulingTask): DateRange | null {
    const daysOff = this.daysOffFor(task);
    const start = skipWorkingDays(earliestStart, 0, daysOff, iterationCap(task.duration));
    if (start === null) return null;
    return this.layoutWithin(start, task, daysOff);
  }

  worksOn(date: string, task: SchedulingTask): boolean {
    return isWorkingDay(date, this.daysOffFor(task));
  }

  private layoutWithin(
    start: string,
    task: SchedulingTask,
    daysOff: ReadonlySet<Weekday>,
  ): DateRange | null {
    const end = addWorkingDays(start, task.duration, daysOff, iterationCap(task.duration));
    return end === null ? null : { start, end };
  }
}

// A calendar with at least one working day per week always fits in this many days
function iterationCap(units: number): number {
  return (units + 1) * DAYS_PER_UNIT_CAP;
}

/**
 * Pick the mapping strategy: working days when a person directory is available,
 * calendar days otherwise.
 */
export function createDateMappingPolicy(
  directory?: PersonDirectory,
  defaultDaysOff?: readonly Weekday[],
): DateMappingPolicy {
  return directory ? new WorkingDayPolicy(directory, defaultDaysOff) : new CalendarDayPolicy();
}

/**
 * Map every graph task to dates from its earliest start time. Tasks the policy
 * cannot place are left out of the map and reported.
 */
export function mapTaskDates(
  projectStart: string,
  tasks: readonly SchedulingTask[],
  graph: DependencyGraph,
  earliest: readonly number[],
  policy: DateMappingPolicy,
  diagnostics: ScheduleDiagnostics,
): Map<string, DateRange> {
  const dates = new Map<string, DateRange>();

  for (const task of tasks) {
    const node = graph.nodeOfTask.get(task.id);
    if (node === undefined) continue;

    const range = policy.place(projectStart, earliest[node], task);
    if (!range) {
      diagnostics.warn(
        'unschedulable_dates',
        task.id,
        'No working days found within the iteration cap; dates left undetermined',
        { offset: earliest[node], duration: task.duration, mode: policy.mode },
      );
      continue;
    }
    dates.set(task.id, range);
  }

  return dates;
}
