/**
 * Tree router for HTTP method and path dispatch.
 *
 * Patterns are `/`-separated: `:name` binds one segment, `*` consumes one or
 * more segments, anything else must match literally. Static segments are
 * tried before variables, variables before wildcards, with backtracking.
 *
 * @example
 * ```typescript
 * import { Router } from "@ramify/router";
 *
 * const router = Router.fromRoutes([
 *   ["GET", "/", "home"],
 *   ["GET", "/user/:user", "user"],
 *   ["GET", "/*", "fallback"],
 * ]);
 *
 * router.find("GET", "/user/ada"); // { handler: "user", params: { user: "ada" }, ... }
 * ```
 *
 * @module
 */

export * from "./src/mod.ts";
