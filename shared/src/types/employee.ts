/**
 * Employee (assignable person) types.
 */

/**
 * ISO weekday number: Monday = 1 ... Sunday = 7.
 */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export interface Employee {
  id: string;
  name: string;
  /** Role the employee can fill; matched against a task's required position. */
  position: string;
  /** Weekly non-working days. Empty means the corporate default calendar applies. */
  daysOff: Weekday[];
  createdAt: string;
  updatedAt: string;
}

export interface CreateEmployeeRequest {
  name: string;
  position: string;
  daysOff?: Weekday[];
}

export interface UpdateEmployeeRequest {
  name?: string;
  position?: string;
  daysOff?: Weekday[];
}

export interface EmployeeListQuery {
  position?: string;
}

export interface EmployeeListResponse {
  employees: Employee[];
}

export interface EmployeeAvailabilityResponse {
  employeeId: string;
  date: string;
  available: boolean;
}

/**
 * A task as it appears in an employee's workload listing.
 * Subtask names are prefixed with their group's name ("Group - Subtask").
 */
export interface WorkloadTask {
  id: string;
  name: string;
  startDate: string | null;
  endDate: string | null;
  duration: number;
  workingDuration: number;
  parallel: boolean;
}

export interface EmployeeWorkload {
  employeeId: string;
  name: string;
  position: string;
  /** Load in days; parallel tasks starting on the same day count once (longest). */
  loadDays: number;
  tasks: WorkloadTask[];
}

export interface WorkloadPositionGroup {
  position: string;
  employees: EmployeeWorkload[];
}

export interface WorkloadResponse {
  projectId: string;
  positions: WorkloadPositionGroup[];
}
