export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required') {
    super('AUTHENTICATION_ERROR', message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super('NOT_FOUND', id ? `${resource} ${id} not found` : `${resource} not found`, 404);
  }
}

/** Injected or genuine overload; callers treat it as expected chaos rather than a crash. */
export class ServiceUnavailableError extends AppError {
  constructor(message = 'Service Unavailable') {
    super('SERVICE_UNAVAILABLE', message, 503);
  }
}

/** Raised client-side when a request never produced an HTTP response. */
export class TransportError extends AppError {
  constructor(message: string, details?: unknown) {
    super('TRANSPORT_ERROR', message, 502, details);
  }
}
