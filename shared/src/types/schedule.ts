/**
 * Scheduling engine types: used by the engine (output) and by API consumers (display).
 */

/**
 * Request body for POST /api/projects/:projectId/schedule.
 */
export interface ScheduleRequest {
  /** Persist computed dates and assignments. Default: false (preview only). */
  apply?: boolean;
  /**
   * Use the employee directory: per-person days off when mapping dates, plus personnel
   * assignment. Default: true. When false, time units are plain calendar days.
   */
  daysOffAware?: boolean;
}

/**
 * Inclusive calendar date range, ISO 8601 YYYY-MM-DD.
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * Explicit structural error tags. A result carrying one has no dates.
 */
export type ScheduleErrorTag = 'cyclic_dependency';

/**
 * Non-fatal conditions recovered during a scheduling run.
 */
export type ScheduleWarningType =
  | 'invalid_task'
  | 'unparseable_predecessors'
  | 'unknown_predecessor'
  | 'unschedulable_dates'
  | 'unknown_person'
  | 'person_unavailable'
  | 'no_eligible_person'
  | 'no_available_window';

export interface ScheduleWarning {
  /** null when the condition is not tied to one task. */
  taskId: string | null;
  type: ScheduleWarningType;
  message: string;
}

export interface ScheduleResponse {
  projectId: string;
  /** Present when the run halted on a structural error. */
  error?: ScheduleErrorTag;
  /** Task IDs participating in the detected cycle (only with error = 'cyclic_dependency'). */
  cycleTaskIds?: string[];
  /** Calendar days from the earliest start to the latest end, inclusive. */
  duration: number;
  /** Project length in abstract time units (earliest time of the sink event). */
  workdayDuration: number;
  /** Zero-slack task IDs in graph node order (not necessarily chronological). */
  criticalPath: string[];
  /** Computed dates per task. Tasks whose dates could not be determined are absent. */
  taskDates: Record<string, DateRange>;
  /** Earliest event times per graph node (0 = source, last = sink). */
  earlyTimes: number[];
  /** Latest event times per graph node. */
  lateTimes: number[];
  /** late - early per graph node. */
  slack: number[];
  /** Predecessor IDs per scheduled task, as used to build the graph. */
  dependencies: Record<string, string[]>;
  /** Employee assigned per task by this run (only tasks whose assignment changed). */
  assignments: Record<string, string>;
  /** Accumulated load in days per employee over this run. */
  workload: Record<string, number>;
  warnings: ScheduleWarning[];
  /** true when the computed dates and assignments were written back. */
  applied: boolean;
}
