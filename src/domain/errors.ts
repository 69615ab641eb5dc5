/**
 * Application error types
 * Each error type maps to a specific HTTP status code and a machine-readable code
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Rejected upload: wrong content type, empty body or undecodable bytes (400 Bad Request)
 */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_INPUT', 400, details);
  }
}

/**
 * Upload exceeds the configured size limit (413 Payload Too Large)
 */
export class PayloadTooLargeError extends AppError {
  constructor(limitBytes: number) {
    super(`File exceeds the ${limitBytes} byte upload limit`, 'PAYLOAD_TOO_LARGE', 413, {
      limitBytes,
    });
  }
}

/**
 * Unknown or expired identifier (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Status change outside the job lifecycle (409 Conflict)
 */
export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Invalid job status transition: ${from} -> ${to}`, 'INVALID_STATUS_TRANSITION', 409, {
      from,
      to,
    });
  }
}

/**
 * Key-value store cannot be reached; retryable (503 Service Unavailable)
 */
export class StoreUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORE_UNAVAILABLE', 503, details);
  }
}

/**
 * Job queue cannot accept or report jobs; retryable (503 Service Unavailable)
 */
export class QueueUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'QUEUE_UNAVAILABLE', 503, details);
  }
}

/**
 * Raised inside a processing job; recorded into the job record, never sent over HTTP
 */
export class ProcessingError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROCESSING_FAILED', 500, details);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Human-readable text for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }
  return 'Unexpected error';
}
