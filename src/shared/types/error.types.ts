/**
 * =============================================================================
 * ERROR TYPES
 * =============================================================================
 *
 * Custom error classes for consistent error handling.
 * All operational errors should use AppError.
 * =============================================================================
 */

/**
 * Application Error class
 * Use this for all known/expected errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly isOperational: boolean = true;

  constructor(
    statusCode: number,
    code: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation Error - 400
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, ErrorCode.VALIDATION_ERROR, message, details);
  }
}

/**
 * Authentication Error - 401
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required', code: string = ErrorCode.UNAUTHORIZED) {
    super(401, code, message);
  }
}

/**
 * Authorization Error - 403
 */
export class AuthorizationError extends AppError {
  constructor(message: string = 'Permission denied') {
    super(403, ErrorCode.FORBIDDEN, message);
  }
}

/**
 * Not Found Error - 404
 */
export class NotFoundError extends AppError {
  constructor(resource: string, details?: Record<string, unknown>) {
    super(404, ErrorCode.NOT_FOUND, `${resource} not found`, details);
  }
}

/**
 * Conflict Error - 409
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, ErrorCode.CONFLICT, message, details);
  }
}

/**
 * Upstream provider failed or answered with something unusable - 502
 */
export class UpstreamServiceError extends AppError {
  constructor(provider: string, message: string, details?: Record<string, unknown>) {
    super(502, ErrorCode.UPSTREAM_ERROR, `${provider}: ${message}`, { provider, ...details });
  }
}

/**
 * Provider not configured - 503
 */
export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(503, ErrorCode.SERVICE_UNAVAILABLE, message);
  }
}

/**
 * Error codes enum for consistent error identification
 */
export enum ErrorCode {
  // Auth errors
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  INVALID_TOKEN = 'INVALID_TOKEN',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',

  // Provider errors
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',

  // General errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFLICT = 'CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  BAD_REQUEST = 'BAD_REQUEST'
}
