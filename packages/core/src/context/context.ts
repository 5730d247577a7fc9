/**
 * Request context for Ramify.
 *
 * Wraps the request together with the result of routing it and offers
 * helpers for reading the body and building responses.
 */

import type { Binding } from "@ramify/router";
import type { ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "../errors/http.ts";
import { toValidationIssues } from "../errors/zod.ts";
import { parseParameters } from "./params.ts";

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const HTML_CONTENT_TYPE = "text/html; charset=utf-8";

const TEXT_HEADERS = Object.freeze({ "Content-Type": TEXT_CONTENT_TYPE });
const HTML_HEADERS = Object.freeze({ "Content-Type": HTML_CONTENT_TYPE });

const TEXT_INIT_200: ResponseInit = { headers: TEXT_HEADERS };
const HTML_INIT_200: ResponseInit = { headers: HTML_HEADERS };

const NO_BINDINGS: readonly Binding[] = Object.freeze([]);

export interface RouteResult {
  params: Record<string, string>;
  bindings: readonly Binding[];
}

/**
 * Request context passed to handlers.
 *
 * @example
 * ```typescript
 * app.get("/users/:id", (ctx) => {
 *   const auth = ctx.headers.get("Authorization");
 *   return ctx.json({ userId: ctx.params.id, auth: auth !== null });
 * });
 * ```
 */
export class Context {
  readonly request: Request;

  /**
   * Path variables by name. For "/users/:id", "/users/123" gives
   * `{ id: "123" }`.
   */
  readonly params: Readonly<Record<string, string>>;

  /**
   * Path variables in the order they appear in the route pattern.
   */
  readonly bindings: readonly Binding[];

  /**
   * Decoded request path, the one the router matched.
   */
  readonly path: string;

  private _url: URL | null;
  private _state: Record<string, unknown> | null = null;

  constructor(
    request: Request,
    route?: RouteResult,
    url?: URL,
    path?: string,
  ) {
    this.request = request;
    this.params = route?.params ?? Object.create(null);
    this.bindings = route?.bindings ?? NO_BINDINGS;
    this._url = url ?? null;
    this.path = path ?? this.url.pathname;
  }

  get url(): URL {
    if (!this._url) {
      this._url = new URL(this.request.url);
    }
    return this._url;
  }

  get method(): string {
    return this.request.method;
  }

  get headers(): Headers {
    return this.request.headers;
  }

  /**
   * @example
   * ```typescript
   * // "/search?q=router&limit=10"
   * ctx.query.get("q"); // "router"
   * ```
   */
  get query(): URLSearchParams {
    return this.url.searchParams;
  }

  /**
   * Fragment without the leading `#`, or "" when there is none. Clients
   * rarely send one.
   */
  get fragment(): string {
    return this.url.hash.slice(1);
  }

  /**
   * Per-request scratch space.
   */
  get state(): Record<string, unknown> {
    if (!this._state) {
      const state: Record<string, unknown> = Object.create(null);
      this._state = state;
      return state;
    }
    return this._state;
  }

  /**
   * Parse the body as JSON, validating it against `schema` when given.
   *
   * @throws {SyntaxError} If the body is not valid JSON
   * @throws {ValidationError} If the body does not match `schema`
   *
   * @example
   * ```typescript
   * const user = await ctx.bodyJson(z.object({ name: z.string() }));
   * ```
   */
  bodyJson(): Promise<unknown>;
  bodyJson<T>(schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
  async bodyJson<T>(
    schema?: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<unknown> {
    const data: unknown = await this.request.json();
    if (!schema) {
      return data;
    }
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(
        "Request body failed validation",
        toValidationIssues(result.error),
      );
    }
    return result.data;
  }

  bodyText(): Promise<string> {
    return this.request.text();
  }

  /**
   * Parse an `application/x-www-form-urlencoded` body.
   */
  async bodyForm(): Promise<Record<string, string>> {
    return parseParameters(await this.request.text());
  }

  json(data: unknown, status = 200): Response {
    if (status === 200) {
      return Response.json(data);
    }
    return Response.json(data, { status });
  }

  text(text: string, status = 200): Response {
    if (status === 200) {
      return new Response(text, TEXT_INIT_200);
    }
    return new Response(text, { status, headers: TEXT_HEADERS });
  }

  html(html: string, status = 200): Response {
    if (status === 200) {
      return new Response(html, HTML_INIT_200);
    }
    return new Response(html, { status, headers: HTML_HEADERS });
  }

  redirect(url: string, status = 302): Response {
    return new Response(null, {
      status,
      headers: { Location: url },
    });
  }

  noContent(): Response {
    return new Response(null, { status: 204 });
  }

  notFound(message = "Not Found"): Response {
    return this.error(404, message);
  }

  error(status: number, message: string): Response {
    return this.json({ error: message }, status);
  }
}
