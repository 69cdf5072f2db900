import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type * as schemaTypes from '../db/schema.js';
import type {
  CreateProjectRequest,
  CreateSubtaskRequest,
  Project,
  ProjectTemplate,
  TemplateSummary,
  TemplateTask,
} from '@crewplan/shared';
import { NotFoundError } from '../errors/AppError.js';
import type { SchedulingLogger } from './scheduling/types.js';
import { createProject } from './projectService.js';
import { createTask, updateTask } from './taskService.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

export const TEMPLATES_FILE = join(__dirname, '..', 'data', 'templates.json');

// ─── Loading ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(path: string, expected: string): never {
  throw new Error(`Invalid template file: ${path} must be ${expected}`);
}

function readString(obj: Record<string, unknown>, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    return invalid(`${path}.${key}`, 'a non-empty string');
  }
  return value;
}

function readOptional<T>(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  guard: (value: unknown) => value is T,
  expected: string,
): T | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!guard(value)) return invalid(`${path}.${key}`, expected);
  return value;
}

const isNumber = (value: unknown): value is number => typeof value === 'number';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isNullableString = (value: unknown): value is string | null =>
  value === null || typeof value === 'string';
const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

function parseSubtask(value: unknown, path: string): CreateSubtaskRequest {
  if (!isRecord(value)) return invalid(path, 'an object');
  const duration = readOptional(value, 'duration', path, isNumber, 'a number');
  if (duration === undefined) return invalid(`${path}.duration`, 'a number');

  return {
    name: readString(value, 'name', path),
    duration,
    position: readOptional(value, 'position', path, isNullableString, 'a string'),
    parallel: readOptional(value, 'parallel', path, isBoolean, 'a boolean'),
    workingDuration: readOptional(value, 'workingDuration', path, isNumber, 'a number'),
  };
}

function parseTask(value: unknown, path: string): TemplateTask {
  if (!isRecord(value)) return invalid(path, 'an object');
  const subtasks = value.subtasks;
  if (subtasks !== undefined && !Array.isArray(subtasks)) {
    return invalid(`${path}.subtasks`, 'a list');
  }

  return {
    name: readString(value, 'name', path),
    duration: readOptional(value, 'duration', path, isNumber, 'a number'),
    workingDuration: readOptional(value, 'workingDuration', path, isNumber, 'a number'),
    isGroup: readOptional(value, 'isGroup', path, isBoolean, 'a boolean'),
    position: readOptional(value, 'position', path, isNullableString, 'a string'),
    predecessors: readOptional(value, 'predecessors', path, isStringList, 'a list of task names'),
    subtasks: subtasks?.map((subtask, i) => parseSubtask(subtask, `${path}.subtasks[${i}]`)),
  };
}

function parseTemplate(value: unknown, path: string): ProjectTemplate {
  if (!isRecord(value)) return invalid(path, 'an object');
  const tasks = value.tasks;
  if (!Array.isArray(tasks)) return invalid(`${path}.tasks`, 'a list');

  return {
    id: readString(value, 'id', path),
    name: readString(value, 'name', path),
    description: typeof value.description === 'string' ? value.description : '',
    tasks: tasks.map((task, i) => parseTask(task, `${path}.tasks[${i}]`)),
  };
}

/**
 * Read and check a template file: `{ "templates": [...] }`.
 * @throws Error naming the first malformed entry
 */
export function loadTemplates(file: string = TEMPLATES_FILE): ProjectTemplate[] {
  const data: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  const entries = isRecord(data) ? data.templates : undefined;
  if (!Array.isArray(entries)) {
    return invalid('templates', 'a list');
  }

  const templates = entries.map((template, i) => parseTemplate(template, `templates[${i}]`));
  const seen = new Set<string>();
  for (const template of templates) {
    if (seen.has(template.id)) {
      throw new Error(`Invalid template file: duplicate template id "${template.id}"`);
    }
    seen.add(template.id);
  }
  return templates;
}

let builtIn: ProjectTemplate[] | null = null;

function builtInTemplates(): ProjectTemplate[] {
  builtIn ??= loadTemplates();
  return builtIn;
}

// ─── Queries ──────────────────────────────────────────────────────────────────

export function listTemplates(
  templates: readonly ProjectTemplate[] = builtInTemplates(),
): TemplateSummary[] {
  return templates.map((template) => ({
    id: template.id,
    name: template.name,
    description: template.description,
    taskCount: template.tasks.length,
  }));
}

/**
 * @throws NotFoundError if no template has this ID
 */
export function getTemplate(
  id: string,
  templates: readonly ProjectTemplate[] = builtInTemplates(),
): ProjectTemplate {
  const template = templates.find((candidate) => candidate.id === id);
  if (!template) {
    throw new NotFoundError('Template not found');
  }
  return template;
}

// ─── Project creation ─────────────────────────────────────────────────────────

const looseName = (name: string) => name.toLowerCase().replace(/\s+/g, '');

/**
 * Task ID for a predecessor name: exact match first, then ignoring case and
 * whitespace.
 */
function resolveName(idsByName: ReadonlyMap<string, string>, name: string): string | undefined {
  const exact = idsByName.get(name.trim());
  if (exact !== undefined) return exact;

  const wanted = looseName(name);
  for (const [candidate, id] of idsByName) {
    if (looseName(candidate) === wanted) return id;
  }
  return undefined;
}

export interface CreateFromTemplateOptions {
  templates?: readonly ProjectTemplate[];
  logger?: SchedulingLogger;
}

/**
 * Create a project seeded with a template's tasks. Tasks and subtasks are created
 * first, then predecessor names are resolved to the new task IDs. Names that match
 * no task are skipped with a warning. Everything happens in one transaction.
 * @throws NotFoundError if the template does not exist
 * @throws ValidationError if the project or a template task is invalid
 * @throws CircularDependencyError if the template's predecessors form a cycle
 */
export function createProjectFromTemplate(
  db: DbType,
  data: CreateProjectRequest & { templateId: string },
  options: CreateFromTemplateOptions = {},
): Project {
  const template = getTemplate(data.templateId, options.templates);

  const project = db.transaction((tx) => {
    const created = createProject(tx, { name: data.name, startDate: data.startDate });

    const idsByName = new Map<string, string>();
    for (const task of template.tasks) {
      const { id } = createTask(tx, created.id, { ...task, predecessors: [] });
      idsByName.set(task.name.trim(), id);
    }

    for (const task of template.tasks) {
      const names = task.predecessors ?? [];
      if (names.length === 0) continue;

      const taskId = resolveName(idsByName, task.name);
      if (taskId === undefined) continue;

      const predecessors: string[] = [];
      for (const name of names) {
        const predId = resolveName(idsByName, name);
        if (predId === undefined) {
          options.logger?.warn(
            { templateId: template.id, task: task.name, predecessor: name },
            'Template predecessor matches no task; skipped',
          );
          continue;
        }
        predecessors.push(predId);
      }
      if (predecessors.length > 0) {
        updateTask(tx, taskId, { predecessors });
      }
    }

    return created;
  });

  options.logger?.info(
    { projectId: project.id, templateId: template.id, tasks: template.tasks.length },
    'Project created from template',
  );
  return project;
}
