/**
 * Base error class for API errors
 */
export class APIError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR',
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * 404 Not Found - Collection, member or object doesn't exist
 */
export class NotFoundError extends APIError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404, 'NOT_FOUND', {
      resource,
      identifier,
    });
  }
}

/**
 * 400 Bad Request - Invalid request body or query string
 */
export class ValidationError extends APIError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

/**
 * 400 Bad Request - Bad page, limit, PID or filter mode.
 * Raised before any query reaches the backend.
 */
export class InvalidArgumentError extends APIError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'INVALID_ARGUMENT', details);
  }
}

/**
 * 409 Conflict - Membership write against a backend that cannot observe it
 */
export class ReadOnlyBackendError extends APIError {
  constructor() {
    super(
      'Membership changes are not supported by the configured query backend',
      409,
      'READ_ONLY_BACKEND'
    );
  }
}

/**
 * 503 Service Unavailable - Query service unreachable or errored
 */
export class BackendUnavailableError extends APIError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Query backend unavailable: ${message}`, 503, 'BACKEND_UNAVAILABLE', details);
  }
}

/**
 * Extract a readable message from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Map error to HTTP Response
 */
export function errorToResponse(error: unknown): Response {
  if (error instanceof APIError) {
    return new Response(JSON.stringify(error.toJSON()), {
      status: error.statusCode,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  // Unknown error - return 500
  console.error('Unexpected error:', error);
  return new Response(
    JSON.stringify({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    }),
    {
      status: 500,
      headers: { 'Content-Type': 'application/json' },
    }
  );
}
