/**
 * Error type definitions.
 */

import type { RamifyError } from "./base.ts";

/**
 * One problem found while validating input or configuration.
 */
export interface ValidationIssue {
  /** Dotted field path, e.g. "router.wildcard" */
  field: string;
  message: string;
  /** Validator code, e.g. "invalid_type" */
  code?: string;
}

/**
 * JSON body of every error response.
 */
export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    status: number;
    details?: unknown;
    stack?: string[];
  };
}

export type ErrorTransformer = (error: unknown) => RamifyError;
