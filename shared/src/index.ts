/**
 * @crewplan/shared
 *
 * Shared TypeScript types used by the server and by API consumers.
 * This package contains API request/response shapes and entity types only.
 */

export type { ApiError, ApiErrorResponse } from './types/api.js';
export type { ErrorCode } from './types/errors.js';

// Projects
export type {
  Project,
  ProjectSummary,
  CreateProjectRequest,
  ProjectListResponse,
} from './types/project.js';

// Templates
export type {
  TemplateTask,
  ProjectTemplate,
  TemplateSummary,
  TemplateListResponse,
} from './types/template.js';

// Employees
export type {
  Weekday,
  Employee,
  CreateEmployeeRequest,
  UpdateEmployeeRequest,
  EmployeeListQuery,
  EmployeeListResponse,
  EmployeeAvailabilityResponse,
  WorkloadTask,
  EmployeeWorkload,
  WorkloadPositionGroup,
  WorkloadResponse,
} from './types/employee.js';

// Tasks
export type {
  Task,
  TaskDetail,
  CreateTaskRequest,
  CreateSubtaskRequest,
  UpdateTaskRequest,
  TaskListQuery,
  TaskListResponse,
} from './types/task.js';

// Scheduling
export type {
  ScheduleRequest,
  ScheduleResponse,
  DateRange,
  ScheduleErrorTag,
  ScheduleWarning,
  ScheduleWarningType,
} from './types/schedule.js';
