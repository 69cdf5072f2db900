/**
 * Normalization at the data-model boundary.
 *
 * Storage hands tasks over with predecessors either as a list or as serialized JSON
 * text, and employees with their days off in the same two forms. Everything is turned
 * into one typed representation here, before any algorithm sees it. Decoding failures
 * become empty sets plus a warning; nothing in this module throws.
 */

import type { Weekday } from '@crewplan/shared';
import type { RawSchedulingTask, ScheduleDiagnostics, SchedulingTask } from './types.js';

export interface DecodedIdList {
  ids: string[];
  /** false when the input was present but could not be decoded. */
  ok: boolean;
}

function toIdList(values: readonly unknown[]): string[] {
  const seen = new Set<string>();
  const ids: string[] = [];
  for (const value of values) {
    let id: string | null = null;
    if (typeof value === 'string' && value.trim().length > 0) {
      id = value.trim();
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      id = String(value);
    }
    if (id !== null && !seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Decode a predecessor reference list given as an array or as JSON text.
 * Order is kept, duplicates and non-ID entries are dropped.
 */
export function decodePredecessors(input: unknown): DecodedIdList {
  if (input === null || input === undefined) {
    return { ids: [], ok: true };
  }
  if (Array.isArray(input)) {
    return { ids: toIdList(input), ok: true };
  }
  if (typeof input === 'string') {
    if (input.trim().length === 0) {
      return { ids: [], ok: true };
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(input);
    } catch {
      return { ids: [], ok: false };
    }
    if (!Array.isArray(parsed)) {
      return { ids: [], ok: false };
    }
    return { ids: toIdList(parsed), ok: true };
  }
  return { ids: [], ok: false };
}

function isWeekday(value: unknown): value is Weekday {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 7;
}

/**
 * Decode a weekly days-off set given as an array or as JSON text.
 * Result is sorted ascending without duplicates; invalid input yields [].
 */
export function decodeWeekdays(input: unknown): Weekday[] {
  let values: unknown = input;
  if (typeof input === 'string') {
    try {
      values = JSON.parse(input);
    } catch {
      return [];
    }
  }
  if (!Array.isArray(values)) {
    return [];
  }
  const unique = new Set<Weekday>();
  for (const value of values) {
    if (isWeekday(value)) unique.add(value);
  }
  return [...unique].sort((a, b) => a - b);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Normalize one task. Returns null (and records a warning) when the task has no
 * usable ID or duration.
 */
export function normalizeTask(
  raw: RawSchedulingTask,
  diagnostics: ScheduleDiagnostics,
): SchedulingTask | null {
  const id = typeof raw.id === 'string' ? raw.id.trim() : '';
  if (id.length === 0) {
    diagnostics.warn('invalid_task', null, 'Task has no ID; skipped', { name: raw.name ?? null });
    return null;
  }
  if (!isPositiveInteger(raw.duration)) {
    diagnostics.warn('invalid_task', id, 'Task has no positive integer duration; skipped', {
      duration: raw.duration ?? null,
    });
    return null;
  }

  const decoded = decodePredecessors(raw.predecessors);
  if (!decoded.ok) {
    diagnostics.warn(
      'unparseable_predecessors',
      id,
      'Predecessor list could not be decoded; treating it as empty',
      { predecessors: raw.predecessors ?? null },
    );
  }

  const position = raw.position?.trim() ?? '';

  return {
    id,
    name: raw.name ?? id,
    duration: raw.duration,
    workingDuration: isPositiveInteger(raw.workingDuration) ? raw.workingDuration : raw.duration,
    isGroup: raw.isGroup === true,
    parallel: raw.parallel === true,
    parentId: raw.parentId ?? null,
    employeeId: raw.employeeId ?? null,
    position: position.length > 0 ? position : null,
    predecessors: decoded.ids,
    startDate: raw.startDate ?? null,
    endDate: raw.endDate ?? null,
  };
}

/**
 * Normalize a task list, keeping input order. Later tasks reusing an ID already seen
 * are skipped.
 */
export function normalizeTasks(
  rawTasks: readonly RawSchedulingTask[],
  diagnostics: ScheduleDiagnostics,
): SchedulingTask[] {
  const tasks: SchedulingTask[] = [];
  const seen = new Set<string>();
  for (const raw of rawTasks) {
    const task = normalizeTask(raw, diagnostics);
    if (!task) continue;
    if (seen.has(task.id)) {
      diagnostics.warn('invalid_task', task.id, 'Duplicate task ID; later occurrence skipped');
      continue;
    }
    seen.add(task.id);
    tasks.push(task);
  }
  return tasks;
}
