/**
 * Error transformation utilities.
 */

import { RouterError } from "@ramify/router";
import { RamifyError } from "./base.ts";
import { BadRequestError, ConflictError, InternalError } from "./http.ts";
import type { ErrorTransformer } from "./types.ts";

/**
 * Converts anything thrown into a RamifyError.
 */
export function defaultErrorTransformer(error: unknown): RamifyError {
  if (error instanceof RamifyError) {
    return error;
  }

  if (error instanceof RouterError) {
    if (error.code === "ROUTE_CONFLICT") {
      return new ConflictError(error.message, { code: error.code });
    }
    return new InternalError(error.message, { code: error.code });
  }

  if (error instanceof Error) {
    if (error.name === "SyntaxError" && error.message.includes("JSON")) {
      return new BadRequestError("Invalid JSON in request body", {
        originalMessage: error.message,
      });
    }

    return new InternalError(error.message, {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new InternalError("An unexpected error occurred", {
    value: String(error),
  });
}

export function errorToResponse(
  error: unknown,
  development = false,
  transformer: ErrorTransformer = defaultErrorTransformer,
): Response {
  return transformer(error).toResponse(development);
}

export function isRamifyError(error: unknown): error is RamifyError {
  return error instanceof RamifyError;
}

/**
 * Operational errors are expected failures such as a missing record.
 */
export function isOperationalError(error: unknown): boolean {
  return error instanceof RamifyError && error.isOperational;
}
