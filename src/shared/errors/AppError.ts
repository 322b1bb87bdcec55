/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors reach the HTTP boundary:
 *
 *   1. Operational errors: expected conditions such as a malformed `page`
 *      parameter or an exhausted connection pool. The client gets the error's
 *      statusCode and message.
 *
 *   2. Everything else: SQL failures, bugs. The client gets a generic 500;
 *      the details only go to the log.
 *
 * `isOperational` carries that distinction to the global error handler.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses of Error whatever the compilation target.
 */
import type { QueryParams } from '@shared/types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/**
 * The pool could not hand out a connection: handshake or auth failure, or
 * the pool stayed exhausted past its acquire timeout. The pool itself stays
 * usable for later requests.
 */
export class ConnectionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 503);
    this.cause = cause;
  }
}

export interface QueryFailure {
  query: string;
  params: QueryParams;
  /** SQLSTATE reported by the server, when there is one. */
  code?: string;
  cause: unknown;
}

/** A statement failed on the server or on the wire. Never shown to clients verbatim. */
export class QueryExecutionError extends AppError {
  public readonly query: string;
  public readonly params: QueryParams;
  public readonly code?: string;

  constructor(message: string, failure: QueryFailure) {
    super(message, 500, false);
    this.query = failure.query;
    this.params = failure.params;
    this.code = failure.code;
    this.cause = failure.cause;
  }
}
