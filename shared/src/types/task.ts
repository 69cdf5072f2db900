/**
 * Task-related types.
 * Tasks form a two-level hierarchy: group tasks own subtasks, subtasks own nothing.
 */

export interface Task {
  id: string;
  projectId: string;
  parentId: string | null;
  name: string;
  /** Positive number of days, inclusive of both endpoints. */
  duration: number;
  /** Duration used for workload aggregation. */
  workingDuration: number;
  isGroup: boolean;
  /** Only meaningful for a subtask: runs alongside its siblings instead of after them. */
  parallel: boolean;
  /** Role required to perform the task. */
  position: string | null;
  employeeId: string | null;
  /** Ordered, duplicate-free predecessor task IDs. */
  predecessors: string[];
  startDate: string | null;
  endDate: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface TaskDetail extends Task {
  subtasks: Task[];
}

export interface CreateSubtaskRequest {
  name: string;
  duration: number;
  position?: string | null;
  parallel?: boolean;
  workingDuration?: number | null;
}

export interface CreateTaskRequest {
  name: string;
  /** Required for leaf tasks; derived from subtasks for group tasks. */
  duration?: number;
  workingDuration?: number | null;
  isGroup?: boolean;
  position?: string | null;
  employeeId?: string | null;
  predecessors?: string[];
  subtasks?: CreateSubtaskRequest[];
}

export interface UpdateTaskRequest {
  name?: string;
  duration?: number;
  workingDuration?: number | null;
  parallel?: boolean;
  position?: string | null;
  employeeId?: string | null;
  predecessors?: string[];
}

export interface TaskListQuery {
  includeSubtasks?: boolean;
}

export interface TaskListResponse {
  tasks: Task[];
}
