/**
 * Project-related types.
 * A project owns a flat list of tasks and fixes the calendar date the schedule starts from.
 */

export interface Project {
  id: string;
  name: string;
  /** Calendar start date, ISO 8601 YYYY-MM-DD (no time-of-day component). */
  startDate: string;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectSummary extends Project {
  taskCount: number;
}

export interface CreateProjectRequest {
  name: string;
  startDate: string;
  /** Seed the project with the tasks of this template. */
  templateId?: string;
}

export interface ProjectListResponse {
  projects: ProjectSummary[];
}
