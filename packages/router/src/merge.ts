import { RouteConflictError } from "./errors.ts";
import { formatPattern } from "./segment.ts";
import type { RouteTree } from "./tree.ts";
import type { Segment } from "./types.ts";

/**
 * Throw if merging `source` into `target` would register a method twice on
 * some node. Writes nothing. `target` is null where the receiving tree has
 * no node yet.
 */
export function assertNoConflicts<T>(
  target: RouteTree<T> | null,
  source: RouteTree<T>,
  prefixNames: readonly string[],
  path: readonly Segment[],
): void {
  if (!target) {
    return;
  }

  for (const [method, item] of source.items) {
    if (target.items.has(method)) {
      throw new RouteConflictError(
        method,
        formatPattern(path, [...prefixNames, ...item.variableNames]),
      );
    }
  }

  for (const [value, child] of source.staticChildren) {
    const segment: Segment = { kind: "static", value };
    assertNoConflicts(
      target.staticChildren.get(value) ?? null,
      child,
      prefixNames,
      [...path, segment],
    );
  }

  if (source.variableChild) {
    const segment: Segment = { kind: "variable", name: "" };
    assertNoConflicts(
      target.variableChild,
      source.variableChild,
      prefixNames,
      [...path, segment],
    );
  }

  if (source.wildcardChild) {
    const segment: Segment = { kind: "wildcard" };
    assertNoConflicts(
      target.wildcardChild,
      source.wildcardChild,
      prefixNames,
      [...path, segment],
    );
  }
}

/**
 * Merge `source` into `target`, node by node.
 *
 * Every item of `source` is stored on the matching `target` node under the
 * same method, with `prefixNames` put in front of its variable names. Missing
 * children are created with the same kind; existing children are reused and
 * never replaced. `source` is only read.
 *
 * `path` is the pattern from the root of the receiving tree to `target`, used
 * to name a route in a conflict error.
 */
export function mergeTree<T>(
  target: RouteTree<T>,
  source: RouteTree<T>,
  prefixNames: readonly string[],
  path: readonly Segment[],
): void {
  for (const [method, item] of source.items) {
    target.setItem(
      method,
      {
        handler: item.handler,
        variableNames: [...prefixNames, ...item.variableNames],
      },
      path,
    );
  }

  for (const [value, child] of source.staticChildren) {
    const segment: Segment = { kind: "static", value };
    mergeTree(target.child(segment), child, prefixNames, [...path, segment]);
  }

  if (source.variableChild) {
    const segment: Segment = { kind: "variable", name: "" };
    mergeTree(
      target.child(segment),
      source.variableChild,
      prefixNames,
      [...path, segment],
    );
  }

  if (source.wildcardChild) {
    const segment: Segment = { kind: "wildcard" };
    mergeTree(
      target.child(segment),
      source.wildcardChild,
      prefixNames,
      [...path, segment],
    );
  }
}
