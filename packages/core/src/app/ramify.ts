import { Router } from "@ramify/router";
import type { Route, RouterOptions } from "@ramify/router";
import { Context } from "../context/context.ts";
import { defaultErrorTransformer } from "../errors/transformer.ts";
import { parseConfig, parseListenOptions } from "../config/config.ts";
import type {
  ListenOptions,
  RamifyConfig,
  ResolvedRamifyConfig,
} from "../config/config.ts";
import { serve } from "../server/node.ts";
import { RamifyGroup } from "./group.ts";
import {
  decodePath,
  joinPath,
  NOT_FOUND_BODY,
  NOT_FOUND_INIT,
  resultToResponse,
} from "./helpers.ts";
import { createLogger, isLogger, silentLogger } from "./logger.ts";
import { RouteMethods } from "./methods.ts";
import type { RequestMethod } from "./methods.ts";
import type { Handler, Logger, ServerHandle } from "./types.ts";

function resolveLogger(option: ResolvedRamifyConfig["logger"]): Logger {
  if (option === false) return silentLogger;
  if (isLogger(option)) return option;
  return createLogger(option);
}

/**
 * HTTP application. Routes are kept relative to the app's prefix; the
 * router that serves requests is rebuilt from them on the next request
 * after a change.
 *
 * @example
 * ```typescript
 * const app = new Ramify({ prefix: "/api" });
 *
 * app.get("/users/:id", (ctx) => ctx.json({ id: ctx.params.id }));
 * app.get("/files/*", (ctx) => ctx.text(ctx.path));
 *
 * await app.listen({ port: 8000 });
 * ```
 */
export class Ramify extends RouteMethods {
  readonly logger: Logger;
  readonly prefix: string;
  readonly development: boolean;

  private readonly routerOptions: RouterOptions;
  private readonly local: Router<Handler>;
  private served: Router<Handler> | null = null;

  /**
   * @throws {ConfigError} If the configuration is invalid
   */
  constructor(config: RamifyConfig = {}) {
    super();
    const resolved = parseConfig(config);
    this.prefix = resolved.prefix;
    this.development = resolved.development;
    this.routerOptions = resolved.router;
    this.local = new Router<Handler>(resolved.router);
    this.logger = resolveLogger(resolved.logger);
  }

  /**
   * Collect routes under `prefix`.
   *
   * @example
   * ```typescript
   * app.group("/users", (users) => {
   *   users.get("/", listUsers);
   *   users.get("/:id", showUser);
   * });
   * ```
   */
  group(prefix: string, configure: (group: RamifyGroup) => void): this {
    const group = new RamifyGroup(this.routerOptions);
    configure(group);
    this.local.mount(prefix, group.router);
    this.changed();
    return this;
  }

  /**
   * Copy the routes of another app into this one. With a prefix the other
   * app's own prefix is replaced by it; without one it is kept. Routes
   * added to the other app afterwards are not picked up.
   */
  mount(app: Ramify): this;
  mount(prefix: string, app: Ramify): this;
  mount(prefixOrApp: string | Ramify, app?: Ramify): this {
    const [prefix, mounted]: [string, Ramify | undefined] = typeof prefixOrApp === "string"
      ? [prefixOrApp, app]
      : [prefixOrApp.prefix, prefixOrApp];

    if (!mounted) {
      throw new TypeError(`mount("${prefix}") needs an app to mount`);
    }
    if (mounted.local.isEmpty) {
      this.logger.warn("Mounted app has no routes", { prefix });
    }

    this.local.mount(prefix, mounted.local);
    this.changed();
    return this;
  }

  /**
   * Every route this app serves, with its full pattern.
   */
  getRoutes(): Route<Handler>[] {
    return this.router().routes();
  }

  /**
   * Stop accepting routes. Called by `listen`.
   */
  seal(): this {
    this.router().seal();
    this.local.seal();
    return this;
  }

  get isSealed(): boolean {
    return this.local.isSealed;
  }

  fetch = async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const path = decodePath(url.pathname);
    const match = this.router().find(request.method, path);

    if (!match) {
      this.logger.debug("No route matched", { method: request.method, path });
      return new Response(NOT_FOUND_BODY, NOT_FOUND_INIT);
    }

    try {
      const ctx = new Context(request, match, url, path);
      return resultToResponse(await match.handler(ctx));
    } catch (error) {
      return this.handleError(error, request.method, path);
    }
  };

  /**
   * Seal the app and serve it over `node:http`.
   *
   * @throws {ConfigError} If the port or hostname is invalid
   */
  async listen(options: ListenOptions = {}): Promise<ServerHandle> {
    const resolved = parseListenOptions(options);
    this.seal();

    const server = await serve(
      this.fetch,
      resolved,
      this.logger,
      this.development,
    );
    this.logger.info("Listening", {
      url: `http://${server.hostname}:${server.port}${this.prefix}`,
      routes: this.getRoutes().length,
    });
    return server;
  }

  protected override register(
    method: RequestMethod,
    path: string,
    handler: Handler,
  ): void {
    this.local.add(method, path, handler);
    this.changed();
    this.logger.debug("Route registered", {
      method,
      path: joinPath(this.prefix, path),
    });
  }

  private handleError(error: unknown, method: string, path: string): Response {
    const failure = defaultErrorTransformer(error);
    const data = { method, path, status: failure.status, code: failure.code };

    if (failure.isOperational) {
      this.logger.debug("Request failed", data);
    } else if (error instanceof Error && error.stack) {
      this.logger.error(failure.message, { ...data, stack: error.stack });
    } else {
      this.logger.error(failure.message, data);
    }

    return failure.toResponse(this.development);
  }

  private changed(): void {
    this.served = null;
  }

  private router(): Router<Handler> {
    if (!this.served) {
      this.served = this.prefix === "/" ? this.local : new Router<Handler>(
        this.routerOptions,
      ).mount(this.prefix, this.local);
    }
    return this.served;
  }
}
