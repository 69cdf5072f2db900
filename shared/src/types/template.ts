/**
 * Project templates: a named task network that a new project can start from.
 * Predecessors are given by task name and resolved to IDs when the project is created.
 */

import type { CreateSubtaskRequest } from './task.js';

export interface TemplateTask {
  name: string;
  /** Required for leaf tasks; derived from subtasks for group tasks. */
  duration?: number;
  workingDuration?: number | null;
  isGroup?: boolean;
  position?: string | null;
  /** Names of other tasks in the same template. */
  predecessors?: string[];
  subtasks?: CreateSubtaskRequest[];
}

export interface ProjectTemplate {
  id: string;
  name: string;
  description: string;
  tasks: TemplateTask[];
}

export interface TemplateSummary {
  id: string;
  name: string;
  description: string;
  taskCount: number;
}

export interface TemplateListResponse {
  templates: TemplateSummary[];
}
