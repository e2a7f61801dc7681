import { Request } from 'express';

export interface BaseError extends Error {
  code: string;
  statusCode: number;
  details?: unknown;
  isOperational?: boolean;
}

export class AppError extends Error implements BaseError {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: unknown;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: unknown,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication failed') {
    super(message, 'AUTHENTICATION_ERROR', 401);
  }
}

/**
 * Raised whenever an access check fails. The message is fixed so that a
 * caller cannot tell which rule denied it.
 */
export class AuthorizationError extends AppError {
  constructor() {
    super('Not permitted', 'AUTHORIZATION_ERROR', 403);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 'NOT_FOUND', 404);
  }
}

/**
 * The record exists but is not in a state that allows the operation
 * (already decided, balance used up by a concurrent approval, already clocked in).
 */
export class StateConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STATE_CONFLICT', 409, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', 409, details);
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details, false);
  }
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    timestamp: string;
    requestId: string;
    path?: string;
  };
}

export function generateCorrelationId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

export function getCorrelationId(req: Request): string {
  return (
    headerValue(req.headers['x-request-id']) ||
    headerValue(req.headers['x-correlation-id']) ||
    generateCorrelationId()
  );
}

interface PgErrorLike {
  code?: string;
  constraint?: string;
  detail?: string;
  column?: string;
  table?: string;
  message?: string;
}

const isPgErrorLike = (error: unknown): error is PgErrorLike =>
  typeof error === 'object' && error !== null && 'code' in error;

export function mapDatabaseError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (!isPgErrorLike(error)) {
    return new DatabaseError('Database operation failed', {
      message: error instanceof Error ? error.message : String(error)
    });
  }

  switch (error.code) {
    case '23505': // unique_violation
      return new ConflictError('A record with this information already exists', {
        constraint: error.constraint,
        detail: error.detail
      });

    case '23503': // foreign_key_violation
      return new ValidationError('Referenced record does not exist', {
        constraint: error.constraint,
        detail: error.detail
      });

    case '23502': // not_null_violation
      return new ValidationError('Required field is missing', {
        column: error.column,
        table: error.table
      });

    case '23514': // check_violation
      return new ValidationError('Invalid data format', {
        constraint: error.constraint,
        detail: error.detail
      });

    case 'ECONNREFUSED':
    case 'ENOTFOUND':
    case 'ETIMEDOUT':
      return new DatabaseError('Database connection failed', { code: error.code });

    default:
      return new DatabaseError('Database operation failed', {
        code: error.code,
        message: error.message
      });
  }
}

export function mapJWTError(error: unknown): AppError {
  const name = error instanceof Error ? error.name : undefined;
  switch (name) {
    case 'JsonWebTokenError':
      return new AuthenticationError('Invalid authentication token');

    case 'TokenExpiredError':
      return new AuthenticationError('Authentication token has expired');

    case 'NotBeforeError':
      return new AuthenticationError('Token not active yet');

    default:
      return new AuthenticationError('Token validation failed');
  }
}
