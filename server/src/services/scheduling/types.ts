/**
 * Input types and collaborator interfaces for the scheduling core.
 *
 * The core consumes plain data and synchronous collaborators only; it never touches
 * the database or the HTTP layer.
 */

import type { FastifyBaseLogger } from 'fastify';
import type { ScheduleWarning, ScheduleWarningType, Weekday } from '@crewplan/shared';

/**
 * A task as it arrives from storage or from a caller, before normalization.
 * `predecessors` may be a list or its serialized JSON text form.
 */
export interface RawSchedulingTask {
  id?: string | null;
  name?: string | null;
  duration?: number | null;
  workingDuration?: number | null;
  isGroup?: boolean | null;
  parallel?: boolean | null;
  parentId?: string | null;
  employeeId?: string | null;
  position?: string | null;
  predecessors?: readonly string[] | string | null;
  startDate?: string | null;
  endDate?: string | null;
}

/**
 * A task after normalization at the data-model boundary. This is the only task shape
 * the algorithms see. Instances are working copies owned by one scheduling run.
 */
export interface SchedulingTask {
  id: string;
  name: string;
  duration: number;
  workingDuration: number;
  isGroup: boolean;
  parallel: boolean;
  parentId: string | null;
  employeeId: string | null;
  position: string | null;
  /** Ordered, duplicate-free. */
  predecessors: string[];
  startDate: string | null;
  endDate: string | null;
}

export interface SchedulingPerson {
  id: string;
  name: string;
  position: string;
  daysOff: readonly Weekday[];
}

export interface SchedulingProject {
  id: string;
  name: string;
  startDate: string;
}

/**
 * Read-only view of the people who can be assigned to tasks.
 * Listing order is the tie-break order for equally loaded candidates.
 */
export interface PersonDirectory {
  listByRole(role: string): SchedulingPerson[];
  getPerson(id: string): SchedulingPerson | undefined;
  /** Optional; the core falls back to the person's weekly days off. */
  isAvailable?(personId: string, date: string): boolean;
}

export type SchedulingLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Collects the non-fatal conditions of one run: each is logged and kept as a
 * typed warning for the result.
 */
export class ScheduleDiagnostics {
  readonly warnings: ScheduleWarning[] = [];

  constructor(readonly log: SchedulingLogger) {}

  warn(
    type: ScheduleWarningType,
    taskId: string | null,
    message: string,
    context: Record<string, unknown> = {},
  ): void {
    this.log.warn({ taskId, warning: type, ...context }, message);
    this.warnings.push({ taskId, type, message });
  }
}
