export interface FieldError {
  field: string;
  message: string;
}

// Error response shape shared by every failing route
export interface ErrorResponse {
  success: false;
  message: string;
  error_code?: string;
  details?: unknown;
  timestamp: string;
}

export function createErrorResponse(
  message: string,
  details?: unknown,
  errorCode?: string
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    message,
    timestamp: new Date().toISOString()
  };

  if (errorCode) {
    response.error_code = errorCode;
  }

  if (details !== undefined && details !== null) {
    response.details = details;
  }

  return response;
}

/*
  Base class for failures that map onto an HTTP status.
  The error middleware in server.ts relies on status and code.
*/
export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get details(): unknown {
    return undefined;
  }
}

export class ValidationError extends AppError {
  readonly status = 422;
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly errors: FieldError[]) {
    super(`Invalid input data: ${errors.map((e) => e.field).join(', ')}`);
  }

  get details(): FieldError[] {
    return this.errors;
  }
}

export class StoreUnavailableError extends AppError {
  readonly status = 500;
  readonly code = 'STORE_UNAVAILABLE';
}

export class StoreQueryError extends AppError {
  readonly status = 500;
  readonly code = 'STORE_QUERY_FAILED';
}

export class StoreWriteError extends AppError {
  readonly status = 500;
  readonly code = 'STORE_WRITE_FAILED';
}

export class InternalError extends AppError {
  readonly status = 500;
  readonly code = 'INTERNAL_SERVER_ERROR';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
