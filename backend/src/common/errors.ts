/**
 * Application errors
 *
 * Every error the API surfaces carries a stable code and an HTTP status.
 * The global error handler in app.ts maps them to `{ ok: false, error, message }`.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'APP_ERROR',
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Every dimension came back without a single scored component.
 */
export class NoDataError extends AppError {
  constructor(message = 'No indicator data available for any risk dimension', details?: unknown) {
    super(message, 'NO_DATA', 422, details);
  }
}

/**
 * Raised at construction / boot only, never per call.
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_INVALID', 500, details);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}
