/**
 * Routing module - typed route handlers.
 */

export type {
  ExtractPathParams,
  PathParams,
  TypedContext,
  TypedHandler,
} from "./types.ts";
export { bindHandler, hasParams, variableNames } from "./typed.ts";
