// Common API types

// Standard error response
export interface ApiError {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: Record<string, unknown>;
  };
}

// Error codes
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  CONFLICT: 'CONFLICT',
  RATE_LIMITED: 'RATE_LIMITED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  DUPLICATE_SERIAL: 'DUPLICATE_SERIAL',
  SERIAL_ALREADY_CLAIMED: 'SERIAL_ALREADY_CLAIMED',
  NOT_CURRENTLY_REGISTERED: 'NOT_CURRENTLY_REGISTERED',
  USER_NOT_ELIGIBLE: 'USER_NOT_ELIGIBLE',
  EVIDENCE_STORAGE_FAILED: 'EVIDENCE_STORAGE_FAILED',
  TEMPORARILY_UNAVAILABLE: 'TEMPORARILY_UNAVAILABLE',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  INVALID_MIME_TYPE: 'INVALID_MIME_TYPE',
  REQUEST_CANCELLED: 'REQUEST_CANCELLED',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Paginated response wrapper
export interface PaginatedResponse<T> {
  items: T[];
  cursor?: string;
  hasMore: boolean;
}

// Health check response
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
}
