/**
 * Machine-readable error codes used across all API error responses.
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'ROUTE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'CIRCULAR_DEPENDENCY'
  | 'SCHEDULE_FAILED'
  | 'INTERNAL_ERROR';
