/**
 * API Server Types
 */

export interface ApiError {
  /** Error code */
  code: string;
  /** Error message */
  message: string;
  /** HTTP status */
  status: number;
  /** Additional details */
  details?: Record<string, unknown>;
  /** Request ID for debugging */
  requestId?: string;
}

export const API_ERRORS = {
  NOT_FOUND: { code: 'NOT_FOUND', message: 'Resource not found', status: 404 },
  VALIDATION_ERROR: { code: 'VALIDATION_ERROR', message: 'Invalid request', status: 400 },
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', message: 'Internal server error', status: 500 },
} as const;

export interface InvalidationResponse {
  message: string;
  pattern: string;
  operationContext: string;
  keysInvalidated: number;
}
