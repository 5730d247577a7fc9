/**
 * Type definitions for the router module.
 */

export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "CONNECT",
  "TRACE",
] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

const METHOD_SET: ReadonlySet<string> = new Set(HTTP_METHODS);

export function isHttpMethod(value: string): value is HttpMethod {
  return METHOD_SET.has(value);
}

/**
 * Classification of one pattern segment.
 *
 * - `static` matches only `value`
 * - `variable` matches any single non-empty segment and binds it to `name`
 * - `wildcard` matches one or more consecutive segments
 */
export type Segment =
  | { kind: "static"; value: string }
  | { kind: "variable"; name: string }
  | { kind: "wildcard" };

export type SegmentKind = Segment["kind"];

/**
 * What a duplicate registration for the same method at the same node does.
 */
export type DuplicatePolicy = "replace" | "reject";

/**
 * Order in which a wildcard tries to consume segments.
 *
 * `greedy` consumes every remaining segment first and gives them back one at
 * a time; `lazy` consumes one segment first and takes more on failure.
 */
export type WildcardStrategy = "greedy" | "lazy";

export interface RouteTreeOptions {
  duplicates?: DuplicatePolicy;
}

export interface RouterOptions extends RouteTreeOptions {
  wildcard?: WildcardStrategy;
}

/**
 * Handler stored at a tree node together with the variable names collected
 * from the root down to that node.
 */
export interface RouteItem<T> {
  readonly handler: T;
  readonly variableNames: readonly string[];
}

export interface Route<T> {
  method: HttpMethod;
  pattern: string;
  handler: T;
}

/**
 * A route given either as an object or as a `[method, pattern, handler]`
 * triple.
 */
export type RouteDefinition<T> =
  | Route<T>
  | readonly [method: HttpMethod, pattern: string, handler: T];

export type Binding = readonly [name: string, value: string];

export interface Match<T> {
  handler: T;
  params: Record<string, string>;
  bindings: Binding[];
}
