/**
 * Ramify core: an HTTP application on top of the `@ramify/router` route
 * tree, served through `node:http`.
 */

export * from "./app/mod.ts";
export * from "./config/mod.ts";
export * from "./context/mod.ts";
export * from "./errors/mod.ts";
export * from "./routing/mod.ts";
export * from "./server/mod.ts";

export {
  HTTP_METHODS,
  isHttpMethod,
  Router,
  RouteConflictError,
  RouterError,
  RouterSealedError,
} from "@ramify/router";
export type {
  Binding,
  HttpMethod,
  Match,
  Route,
  RouteDefinition,
  RouterOptions,
  WildcardStrategy,
} from "@ramify/router";
