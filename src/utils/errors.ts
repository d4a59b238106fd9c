/**
 * Custom Error Classes
 * Transport-level errors with HTTP status codes
 */

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Input failed shape or identifier validation before reaching data access
 */
export class BadRequestError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'BAD_REQUEST', details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, 404, 'NOT_FOUND');
  }
}

/**
 * Any data-access failure surfaced to the client
 */
export class InternalError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'INTERNAL_ERROR', details);
  }
}
