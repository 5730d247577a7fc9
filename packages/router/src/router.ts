/**
 * Router facade over a {@link RouteTree}.
 *
 * Design:
 * - One tree for all methods; methods are keyed on the nodes
 * - Static children win over variable children, which win over wildcards
 * - Duplicate registration and wildcard order are options, not hard-coded
 * - `seal()` ends construction; a sealed router is only read
 */

import { RouterSealedError } from "./errors.ts";
import { toRoute, RouteTree } from "./tree.ts";
import type {
  HttpMethod,
  Match,
  Route,
  RouteDefinition,
  RouterOptions,
  WildcardStrategy,
} from "./types.ts";

/**
 * Router class for registering and matching HTTP routes.
 *
 * @example
 * ```typescript
 * const router = new Router<Handler>();
 *
 * router.add("GET", "/users", listUsers);
 * router.add("GET", "/users/:id", showUser);
 * router.add("GET", "/files/*", serveFile);
 *
 * const match = router.find("GET", "/users/123");
 * if (match) {
 *   match.handler(match.params); // { id: "123" }
 * }
 * ```
 */
export class Router<T> {
  private readonly tree: RouteTree<T>;
  readonly wildcard: WildcardStrategy;
  private sealed = false;

  constructor(options: RouterOptions = {}) {
    this.tree = new RouteTree<T>({ duplicates: options.duplicates });
    this.wildcard = options.wildcard ?? "lazy";
  }

  static fromRoutes<T>(
    routes: Iterable<RouteDefinition<T>>,
    options: RouterOptions = {},
  ): Router<T> {
    return new Router<T>(options).addAll(routes);
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get isEmpty(): boolean {
    return this.tree.isEmpty;
  }

  /**
   * Register a new route.
   *
   * @throws {RouteConflictError} If the route is already registered and
   * duplicates are rejected
   * @throws {RouterSealedError} If the router is sealed
   */
  add(method: HttpMethod, pattern: string, handler: T): this {
    this.assertOpen(`add ${method} ${pattern}`);
    this.tree.insert(method, pattern, handler);
    return this;
  }

  addAll(routes: Iterable<RouteDefinition<T>>): this {
    for (const definition of routes) {
      const route = toRoute(definition);
      this.add(route.method, route.pattern, route.handler);
    }
    return this;
  }

  /**
   * Copy all routes of another router or tree below `prefix`.
   *
   * @example
   * ```typescript
   * const users = Router.fromRoutes([["GET", "/:id", showUser]]);
   * router.mount("/orgs/:org/users", users);
   * router.find("GET", "/orgs/acme/users/7")?.params; // { org: "acme", id: "7" }
   * ```
   */
  mount(prefix: string, other: Router<T> | RouteTree<T>): this {
    this.assertOpen(`mount at ${prefix}`);
    const tree = other instanceof Router ? other.tree : other;
    this.tree.insertSubtree(prefix, tree);
    return this;
  }

  /**
   * Find a matching route for the given method and path.
   *
   * `path` must already be percent-decoded.
   */
  find(method: string, path: string): Match<T> | null {
    return this.tree.find(method, path, this.wildcard);
  }

  /**
   * Stop accepting routes. Idempotent.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  /**
   * Get all registered routes.
   */
  routes(): Route<T>[] {
    return this.tree.routes();
  }

  private assertOpen(operation: string): void {
    if (this.sealed) {
      throw new RouterSealedError(operation);
    }
  }
}
