/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors reach the global error handler:
 *
 *   1. Operational errors — expected problems such as an invalid request
 *      body. They carry an HTTP status and a message safe to show the client.
 *
 *   2. Programmer/configuration errors — a missing access-log format, a
 *      missing sink callback. These are marked non-operational; they are
 *      thrown at startup and abort it, and if one ever surfaced during a
 *      request the handler would answer a generic 500.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses when compiling down to older targets.
 */
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

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}
