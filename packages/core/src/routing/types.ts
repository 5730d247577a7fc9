import type { Context } from "../context/context.ts";

/**
 * Extract path variable names from a route pattern.
 *
 * @example
 * ExtractPathParams<"/users/:id/posts/:postId"> // "id" | "postId"
 */
export type ExtractPathParams<T extends string> = T extends
  `${string}:${infer Param}/${infer Rest}`
  ? Param | ExtractPathParams<`/${Rest}`>
  : T extends `${string}:${infer Param}` ? Param
  : never;

/**
 * Params object type for a route pattern.
 *
 * @example
 * PathParams<"/users/:id"> // { id: string }
 */
export type PathParams<T extends string> = {
  [K in ExtractPathParams<T>]: string;
};

/**
 * Context whose `params` carry the variables of a known pattern.
 */
export type TypedContext<TParams> = Context & { readonly params: TParams };

export type TypedHandler<TParams> = (ctx: TypedContext<TParams>) => unknown;
