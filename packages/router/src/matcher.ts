/**
 * Backtracking search over a route tree.
 *
 * At every node the static child is tried first, then the variable child,
 * then the wildcard child. A branch that fails hands control back to the
 * next alternative, so a shallow choice never hides a deeper match.
 */

import { segmentPath } from "./segment.ts";
import type { RouteTree } from "./tree.ts";
import {
  type Binding,
  type HttpMethod,
  isHttpMethod,
  type Match,
  type RouteItem,
  type WildcardStrategy,
} from "./types.ts";

// Frozen empty params - single allocation, reused everywhere
const EMPTY_PARAMS: Record<string, string> = Object.freeze(Object.create(null));

interface SearchState {
  readonly method: HttpMethod;
  readonly segments: readonly string[];
  readonly strategy: WildcardStrategy;
  // Values of the variable positions passed so far, root to leaf
  readonly captures: string[];
}

/**
 * Find the handler for `method` and `path` together with its bindings.
 *
 * Returns `null` when nothing matches, including for methods that are not
 * HTTP methods at all.
 */
export function matchTree<T>(
  root: RouteTree<T>,
  method: string,
  path: string,
  strategy: WildcardStrategy,
): Match<T> | null {
  if (!isHttpMethod(method)) return null;

  const state: SearchState = {
    method,
    segments: segmentPath(path),
    strategy,
    captures: [],
  };

  const item = search(root, 0, state);
  return item ? bind(item, state.captures) : null;
}

// On failure `captures` is left exactly as it was on entry.
function search<T>(
  node: RouteTree<T>,
  index: number,
  state: SearchState,
): RouteItem<T> | null {
  const segments = state.segments;

  // End of path - check for an item at the current node
  if (index >= segments.length) {
    return node.items.get(state.method) ?? null;
  }

  const segment = segments[index];

  // 1. Static child (most specific)
  const staticChild = node.staticChildren.get(segment);
  if (staticChild) {
    const result = search(staticChild, index + 1, state);
    if (result) return result;
  }

  // 2. Variable child, which needs a non-empty segment to bind
  const variableChild = node.variableChild;
  if (variableChild && segment.length > 0) {
    state.captures.push(segment);
    const result = search(variableChild, index + 1, state);
    if (result) return result;
    state.captures.pop();
  }

  // 3. Wildcard child, consuming at least one segment
  const wildcardChild = node.wildcardChild;
  if (wildcardChild) {
    return state.strategy === "greedy"
      ? searchGreedy(wildcardChild, index, state)
      : searchLazy(wildcardChild, index, state);
  }

  return null;
}

function searchGreedy<T>(
  wildcardChild: RouteTree<T>,
  index: number,
  state: SearchState,
): RouteItem<T> | null {
  for (let next = state.segments.length; next > index; next--) {
    const result = search(wildcardChild, next, state);
    if (result) return result;
  }
  return null;
}

function searchLazy<T>(
  wildcardChild: RouteTree<T>,
  index: number,
  state: SearchState,
): RouteItem<T> | null {
  const len = state.segments.length;
  for (let next = index + 1; next <= len; next++) {
    const result = search(wildcardChild, next, state);
    if (result) return result;
  }
  return null;
}

/**
 * Pair variable names with captured values by position.
 *
 * Extra names or values are dropped. A name that occurs twice keeps its
 * first position and the later value.
 */
function bind<T>(item: RouteItem<T>, captures: readonly string[]): Match<T> {
  const names = item.variableNames;
  const count = Math.min(names.length, captures.length);

  if (count === 0) {
    return { handler: item.handler, params: EMPTY_PARAMS, bindings: [] };
  }

  const values = new Map<string, string>();
  for (let i = 0; i < count; i++) {
    values.set(names[i], captures[i]);
  }

  const params: Record<string, string> = Object.create(null);
  const bindings: Binding[] = [];
  for (const [name, value] of values) {
    params[name] = value;
    bindings.push([name, value]);
  }

  return { handler: item.handler, params, bindings };
}
