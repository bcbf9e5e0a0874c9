import { ErrorCode, type ApiError } from '@warranty/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toApiError(requestId: string): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        requestId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found: ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(ErrorCode.UNAUTHORIZED, message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(ErrorCode.FORBIDDEN, message, 403);
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(ErrorCode.CONFLICT, message, 409);
    this.name = 'ConflictError';
  }
}

export class RateLimitedError extends AppError {
  constructor(
    public readonly retryAfterSeconds: number,
    message = 'Rate limit exceeded'
  ) {
    super(ErrorCode.RATE_LIMITED, message, 429, { retryAfterSeconds });
    this.name = 'RateLimitedError';
  }
}

export class DuplicateSerialError extends AppError {
  constructor(serialNumber: string) {
    super(ErrorCode.DUPLICATE_SERIAL, `Serial number already exists: ${serialNumber}`, 409);
    this.name = 'DuplicateSerialError';
  }
}

export class SerialAlreadyClaimedError extends AppError {
  constructor(serialNumber: string) {
    super(
      ErrorCode.SERIAL_ALREADY_CLAIMED,
      `Serial number is not available for registration: ${serialNumber}`,
      409
    );
    this.name = 'SerialAlreadyClaimedError';
  }
}

export class NotCurrentlyRegisteredError extends AppError {
  constructor(serialNumber: string) {
    super(
      ErrorCode.NOT_CURRENTLY_REGISTERED,
      `Serial number is not currently registered to a user: ${serialNumber}`,
      400
    );
    this.name = 'NotCurrentlyRegisteredError';
  }
}

export class UserNotEligibleError extends AppError {
  constructor(userId: string) {
    super(
      ErrorCode.USER_NOT_ELIGIBLE,
      `User not found, inactive, or not permitted to register serials: ${userId}`,
      403
    );
    this.name = 'UserNotEligibleError';
  }
}

export class EvidenceStorageFailedError extends AppError {
  constructor() {
    super(ErrorCode.EVIDENCE_STORAGE_FAILED, 'Failed to store proof-of-purchase file', 502);
    this.name = 'EvidenceStorageFailedError';
  }
}

export class TemporarilyUnavailableError extends AppError {
  constructor(operation: string) {
    super(
      ErrorCode.TEMPORARILY_UNAVAILABLE,
      `Storage is temporarily unavailable during ${operation}, retry later`,
      503
    );
    this.name = 'TemporarilyUnavailableError';
  }
}

export class RequestCancelledError extends AppError {
  constructor() {
    // 499: client closed request
    super(ErrorCode.REQUEST_CANCELLED, 'Request was cancelled before completion', 499);
    this.name = 'RequestCancelledError';
  }
}

export class FileTooLargeError extends AppError {
  constructor(maxBytes: number) {
    super(
      ErrorCode.FILE_TOO_LARGE,
      `File exceeds maximum size of ${maxBytes} bytes`,
      400
    );
    this.name = 'FileTooLargeError';
  }
}

export class InvalidMimeTypeError extends AppError {
  constructor(mimeType: string, allowed: readonly string[]) {
    super(
      ErrorCode.INVALID_MIME_TYPE,
      `Invalid MIME type: ${mimeType}. Allowed: ${allowed.join(', ')}`,
      400
    );
    this.name = 'InvalidMimeTypeError';
  }
}
