/**
 * Errors module - structured error handling.
 */

export { RamifyError } from "./base.ts";
export {
  BadRequestError,
  ConfigError,
  ConflictError,
  InternalError,
  NotFoundError,
  ValidationError,
} from "./http.ts";
export { toValidationIssues } from "./zod.ts";
export {
  defaultErrorTransformer,
  errorToResponse,
  isOperationalError,
  isRamifyError,
} from "./transformer.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  ValidationIssue,
} from "./types.ts";
