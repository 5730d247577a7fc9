import { toRoute } from "@ramify/router";
import type { HttpMethod, RouteDefinition } from "@ramify/router";
import { bindHandler } from "../routing/typed.ts";
import type { PathParams, TypedHandler } from "../routing/types.ts";
import type { Handler } from "./types.ts";

/**
 * Methods a fetch `Request` can carry. `CONNECT` and `TRACE` are forbidden
 * request methods, so routes for them could never be reached.
 */
export type RequestMethod = Exclude<HttpMethod, "CONNECT" | "TRACE">;

const UNREACHABLE_METHODS: ReadonlySet<HttpMethod> = new Set([
  "CONNECT",
  "TRACE",
]);

export function isRequestMethod(method: HttpMethod): method is RequestMethod {
  return !UNREACHABLE_METHODS.has(method);
}

/**
 * Route registration shared by apps and groups. Subclasses decide where
 * a route ends up.
 */
export abstract class RouteMethods {
  protected abstract register(
    method: RequestMethod,
    path: string,
    handler: Handler,
  ): void;

  get<TPath extends string>(
    path: TPath,
    handler: TypedHandler<PathParams<TPath>>,
  ): this {
    return this.on("GET", path, handler);
  }

  post<TPath extends string>(
    path: TPath,
    handler: TypedHandler<PathParams<TPath>>,
  ): this {
    return this.on("POST", path, handler);
  }

  put<TPath extends string>(
    path: TPath,
    handler: TypedHandler<PathParams<TPath>>,
  ): this {
    return this.on("PUT", path, handler);
  }

  patch<TPath extends string>(
    path: TPath,
    handler: TypedHandler<PathParams<TPath>>,
  ): this {
    return this.on("PATCH", path, handler);
  }

  delete<TPath extends string>(
    path: TPath,
    handler: TypedHandler<PathParams<TPath>>,
  ): this {
    return this.on("DELETE", path, handler);
  }

  head<TPath extends string>(
    path: TPath,
    handler: TypedHandler<PathParams<TPath>>,
  ): this {
    return this.on("HEAD", path, handler);
  }

  options<TPath extends string>(
    path: TPath,
    handler: TypedHandler<PathParams<TPath>>,
  ): this {
    return this.on("OPTIONS", path, handler);
  }

  on<TPath extends string>(
    method: RequestMethod,
    path: TPath,
    handler: TypedHandler<PathParams<TPath>>,
  ): this {
    this.register(method, path, bindHandler(path, handler));
    return this;
  }

  /**
   * Register a list of untyped routes, as triples or route objects.
   *
   * @throws {TypeError} For a `CONNECT` or `TRACE` route
   *
   * @example
   * ```typescript
   * app.routes([
   *   ["GET", "/health", () => "ok"],
   *   { method: "GET", pattern: "/users/:id", handler: showUser },
   * ]);
   * ```
   */
  routes(definitions: Iterable<RouteDefinition<Handler>>): this {
    for (const definition of definitions) {
      const { method, pattern, handler } = toRoute(definition);
      if (!isRequestMethod(method)) {
        throw new TypeError(`${method} ${pattern} can never be requested`);
      }
      this.register(method, pattern, handler);
    }
    return this;
  }
}
