import { parsePattern } from "@ramify/router";
import type { Context } from "../context/context.ts";
import { InternalError } from "../errors/http.ts";
import type { Handler } from "../app/types.ts";
import type { PathParams, TypedContext, TypedHandler } from "./types.ts";

/**
 * Variable names declared by a pattern, in order.
 */
export function variableNames(pattern: string): string[] {
  return parsePattern(pattern).flatMap((segment) =>
    segment.kind === "variable" ? [segment.name] : []
  );
}

/**
 * Whether every name in `names` is bound on the context.
 */
export function hasParams<TParams>(
  ctx: Context,
  names: readonly string[],
): ctx is TypedContext<TParams> {
  return names.every((name) => name in ctx.params);
}

/**
 * Adapt a handler typed against `pattern` to the untyped handler the
 * router stores. The route's variables are checked on each call.
 */
export function bindHandler<TPath extends string>(
  pattern: TPath,
  handler: TypedHandler<PathParams<TPath>>,
): Handler {
  const names = variableNames(pattern);

  return (ctx) => {
    if (!hasParams<PathParams<TPath>>(ctx, names)) {
      throw new InternalError(
        `Route ${pattern} matched without its variables`,
        { expected: names, bound: Object.keys(ctx.params) },
      );
    }
    return handler(ctx);
  };
}
