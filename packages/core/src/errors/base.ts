/**
 * Base error class for Ramify.
 */

import type { ErrorResponse } from "./types.ts";

const JSON_HEADERS = Object.freeze({
  "Content-Type": "application/json; charset=utf-8",
});

/**
 * Error with an HTTP status and a machine-readable code.
 *
 * Anything a handler throws is converted to a `RamifyError` before it is
 * written out, so this is the single shape clients see.
 *
 * @example
 * ```typescript
 * throw new RamifyError("Upstream timed out", 504, "UPSTREAM_TIMEOUT");
 * ```
 */
export class RamifyError extends Error {
  readonly status: number;
  readonly code: string;
  /** Extra context, only serialized in development mode */
  readonly details?: unknown;
  /** False for programming errors, which are logged at error level */
  readonly isOperational: boolean;

  constructor(
    message: string,
    status = 500,
    code = "INTERNAL_ERROR",
    details?: unknown,
    isOperational = true,
  ) {
    super(message);
    this.name = "RamifyError";
    this.status = status;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * JSON error response. Details and the stack trace are only written in
   * development mode, so production clients see message, code and status.
   */
  toResponse(development = false): Response {
    const body: ErrorResponse = {
      error: {
        message: this.message,
        code: this.code,
        status: this.status,
      },
    };

    if (development) {
      if (this.details !== undefined) {
        body.error.details = this.details;
      }
      if (this.stack) {
        body.error.stack = this.stack.split("\n").map((line) => line.trim());
      }
    }

    return new Response(JSON.stringify(body), {
      status: this.status,
      headers: JSON_HEADERS,
    });
  }
}
