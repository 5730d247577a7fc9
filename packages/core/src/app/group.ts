import { Router } from "@ramify/router";
import type { RouterOptions } from "@ramify/router";
import { RouteMethods } from "./methods.ts";
import type { RequestMethod } from "./methods.ts";
import type { Handler } from "./types.ts";

/**
 * Routes collected under a common prefix. A group builds its own router,
 * which the parent mounts below the prefix once `configure` returns.
 *
 * @example
 * ```typescript
 * app.group("/orgs/:org", (org) => {
 *   org.get("/", (ctx) => ctx.json({ org: ctx.params.org }));
 *   org.group("/users", (users) => users.get("/:id", showUser));
 * });
 * ```
 */
export class RamifyGroup extends RouteMethods {
  readonly router: Router<Handler>;

  constructor(private readonly routerOptions: RouterOptions = {}) {
    super();
    this.router = new Router<Handler>(routerOptions);
  }

  group(prefix: string, configure: (group: RamifyGroup) => void): this {
    const nested = new RamifyGroup(this.routerOptions);
    configure(nested);
    this.router.mount(prefix, nested.router);
    return this;
  }

  protected override register(
    method: RequestMethod,
    path: string,
    handler: Handler,
  ): void {
    this.router.add(method, path, handler);
  }
}
