/**
 * HTTP error classes.
 */

import { RamifyError } from "./base.ts";
import type { ValidationIssue } from "./types.ts";

/**
 * 400 Bad Request error.
 */
export class BadRequestError extends RamifyError {
  constructor(message = "Bad Request", details?: unknown) {
    super(message, 400, "BAD_REQUEST", details);
    this.name = "BadRequestError";
  }
}

/**
 * 404 Not Found error.
 */
export class NotFoundError extends RamifyError {
  constructor(message = "Not Found", details?: unknown) {
    super(message, 404, "NOT_FOUND", details);
    this.name = "NotFoundError";
  }
}

/**
 * 409 Conflict error.
 */
export class ConflictError extends RamifyError {
  constructor(message = "Conflict", details?: unknown) {
    super(message, 409, "CONFLICT", details);
    this.name = "ConflictError";
  }
}

/**
 * 500 Internal Server Error. Not operational: it signals a bug.
 */
export class InternalError extends RamifyError {
  constructor(message = "Internal Server Error", details?: unknown) {
    super(message, 500, "INTERNAL_ERROR", details, false);
    this.name = "InternalError";
  }
}

/**
 * Invalid application or listen configuration.
 */
export class ConfigError extends RamifyError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, 500, "INVALID_CONFIG", issues, false);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * 422 Unprocessable Entity error (validation error).
 */
export class ValidationError extends RamifyError {
  readonly errors: ValidationIssue[];

  constructor(message = "Validation Error", errors: ValidationIssue[] = []) {
    super(message, 422, "VALIDATION_ERROR", errors);
    this.name = "ValidationError";
    this.errors = errors;
  }
}
