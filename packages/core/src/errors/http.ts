/**
 * HTTP error classes.
 */

import { TrackerError } from "./base.ts";
import type { ValidationIssue } from "./types.ts";

/**
 * 400 Bad Request error.
 */
export class BadRequestError extends TrackerError {
  constructor(message = "Bad Request", details?: unknown) {
    super(message, { status: 400, code: "BAD_REQUEST", details });
    this.name = "BadRequestError";
  }
}

/**
 * 404 Not Found error.
 */
export class NotFoundError extends TrackerError {
  constructor(message = "Not Found", details?: unknown) {
    super(message, { status: 404, code: "NOT_FOUND", details });
    this.name = "NotFoundError";
  }
}

/**
 * 405 Method Not Allowed error.
 *
 * The response carries an `Allow` header listing the methods the path
 * does answer.
 */
export class MethodNotAllowedError extends TrackerError {
  readonly allowed: readonly string[];

  constructor(allowed: readonly string[], message = "Method Not Allowed") {
    super(message, {
      status: 405,
      code: "METHOD_NOT_ALLOWED",
      details: { allowed },
      headers: { Allow: allowed.join(", ") },
    });
    this.name = "MethodNotAllowedError";
    this.allowed = allowed;
  }
}

/**
 * 422 Unprocessable Entity error (validation error).
 */
export class ValidationError extends TrackerError {
  readonly errors: ValidationIssue[];

  constructor(message = "Validation Error", errors: ValidationIssue[] = []) {
    super(message, {
      status: 422,
      code: "VALIDATION_ERROR",
      details: errors,
    });
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * 500 Internal Server Error.
 */
export class InternalError extends TrackerError {
  constructor(message = "Internal Server Error", details?: unknown) {
    super(message, { details, operational: false });
    this.name = "InternalError";
  }
}
