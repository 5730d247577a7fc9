/**
 * Routing engine for Ramify.
 *
 * @module
 */

export { Router } from "./router.ts";
export { RouteTree, toRoute } from "./tree.ts";
export { matchTree } from "./matcher.ts";
export { mergeTree } from "./merge.ts";
export {
  formatPattern,
  parsePattern,
  parseSegment,
  segmentPath,
  WILDCARD,
} from "./segment.ts";
export {
  RouteConflictError,
  RouterError,
  RouterSealedError,
} from "./errors.ts";
export { HTTP_METHODS, isHttpMethod } from "./types.ts";
export type {
  Binding,
  DuplicatePolicy,
  HttpMethod,
  Match,
  Route,
  RouteDefinition,
  RouteItem,
  RouterOptions,
  RouteTreeOptions,
  Segment,
  SegmentKind,
  WildcardStrategy,
} from "./types.ts";
