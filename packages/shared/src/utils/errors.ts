// Centralized error handling utilities

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class ExternalApiError extends AppError {
  constructor(service: string, message: string, status: number = 502, details?: Record<string, unknown>) {
    super(`${service} API error: ${message}`, 'EXTERNAL_API_ERROR', status, details);
    this.name = 'ExternalApiError';
  }
}

/**
 * Raised when code asks a raw result for a field the service did not return.
 * This is a programmer error, never a transport one.
 */
export class MissingFieldError extends AppError {
  constructor(
    public kind: string,
    public field: string
  ) {
    super(`${kind} result has no field "${field}"`, 'MISSING_FIELD', 500, { kind, field });
    this.name = 'MissingFieldError';
  }
}
