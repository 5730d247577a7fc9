/**
 * Route tree: one node per pattern segment position.
 *
 * Each node keeps the handlers registered for the path that leads to it,
 * keyed by method, plus its children: any number of static children keyed by
 * literal text, at most one variable child and at most one wildcard child.
 * Children are owned by their parent only, so the tree never has cycles.
 */

import { RouteConflictError } from "./errors.ts";
import { matchTree } from "./matcher.ts";
import { assertNoConflicts, mergeTree } from "./merge.ts";
import { formatPattern, parsePattern } from "./segment.ts";
import type {
  DuplicatePolicy,
  HttpMethod,
  Match,
  Route,
  RouteDefinition,
  RouteItem,
  RouteTreeOptions,
  Segment,
  WildcardStrategy,
} from "./types.ts";

export function toRoute<T>(definition: RouteDefinition<T>): Route<T> {
  if ("pattern" in definition) {
    return definition;
  }
  const [method, pattern, handler] = definition;
  return { method, pattern, handler };
}

export class RouteTree<T> {
  readonly items: Map<HttpMethod, RouteItem<T>> = new Map();
  readonly staticChildren: Map<string, RouteTree<T>> = new Map();
  variableChild: RouteTree<T> | null = null;
  wildcardChild: RouteTree<T> | null = null;
  readonly duplicates: DuplicatePolicy;

  constructor(options: RouteTreeOptions = {}) {
    this.duplicates = options.duplicates ?? "replace";
  }

  /**
   * Build a tree by inserting every route in order.
   *
   * @example
   * ```typescript
   * const tree = RouteTree.fromRoutes([
   *   ["GET", "/about", aboutUs],
   *   ["GET", "/user/:user", showUser],
   *   ["GET", "/*", showError],
   * ]);
   * ```
   */
  static fromRoutes<T>(
    routes: Iterable<RouteDefinition<T>>,
    options: RouteTreeOptions = {},
  ): RouteTree<T> {
    const tree = new RouteTree<T>(options);
    for (const definition of routes) {
      const route = toRoute(definition);
      tree.insert(route.method, route.pattern, route.handler);
    }
    return tree;
  }

  /**
   * Insert a handler at `pattern`.
   *
   * @throws {RouteConflictError} If the method is already registered at that
   * node and the tree rejects duplicates
   */
  insert(method: HttpMethod, pattern: string, handler: T): void {
    const segments = parsePattern(pattern);
    const variableNames: string[] = [];
    const node = this.descend(segments, variableNames);
    node.setItem(method, { handler, variableNames }, segments);
  }

  /**
   * Copy every route of `other` below `prefix`.
   *
   * Variable names collected along the prefix are put in front of the names
   * stored in `other`. `other` is left untouched and shares no nodes with
   * this tree afterwards. When duplicates are rejected, a conflict anywhere
   * in `other` is found before anything is copied.
   *
   * @throws {RouteConflictError} If a route of `other` is already registered
   * and the tree rejects duplicates
   */
  insertSubtree(prefix: string, other: RouteTree<T>): void {
    const segments = parsePattern(prefix);
    const variableNames: string[] = [];
    // Snapshot first: `other` may be this tree or one of its nodes.
    const snapshot = other.clone();
    if (this.duplicates === "reject") {
      const prefixNames = segments.flatMap((segment) =>
        segment.kind === "variable" ? [segment.name] : []
      );
      assertNoConflicts(this.lookup(segments), snapshot, prefixNames, segments);
    }
    const node = this.descend(segments, variableNames);
    mergeTree(node, snapshot, variableNames, segments);
  }

  find(
    method: string,
    path: string,
    strategy: WildcardStrategy = "lazy",
  ): Match<T> | null {
    return matchTree(this, method, path, strategy);
  }

  /**
   * Child for a pattern segment, created if missing.
   */
  child(segment: Segment): RouteTree<T> {
    switch (segment.kind) {
      case "wildcard":
        if (!this.wildcardChild) {
          this.wildcardChild = this.createNode();
        }
        return this.wildcardChild;
      case "variable":
        if (!this.variableChild) {
          this.variableChild = this.createNode();
        }
        return this.variableChild;
      case "static": {
        let child = this.staticChildren.get(segment.value);
        if (!child) {
          child = this.createNode();
          this.staticChildren.set(segment.value, child);
        }
        return child;
      }
    }
  }

  /**
   * Store an item for `method` on this node.
   *
   * `path` is only used to name the route in a conflict error.
   */
  setItem(
    method: HttpMethod,
    item: RouteItem<T>,
    path: readonly Segment[],
  ): void {
    if (this.duplicates === "reject" && this.items.has(method)) {
      throw new RouteConflictError(
        method,
        formatPattern(path, item.variableNames),
      );
    }
    this.items.set(method, item);
  }

  clone(): RouteTree<T> {
    const copy = this.createNode();
    mergeTree(copy, this, [], []);
    return copy;
  }

  /**
   * Every registered route, depth first: a node's own items, then its
   * static children in insertion order, then the variable child, then the
   * wildcard child.
   */
  routes(): Route<T>[] {
    const routes: Route<T>[] = [];
    collectRoutes(this, [], routes);
    return routes;
  }

  get isEmpty(): boolean {
    return this.items.size === 0 && this.staticChildren.size === 0 &&
      this.variableChild === null && this.wildcardChild === null;
  }

  private createNode(): RouteTree<T> {
    return new RouteTree<T>({ duplicates: this.duplicates });
  }

  /**
   * Existing node for `segments`, or null. Creates nothing.
   */
  private lookup(segments: readonly Segment[]): RouteTree<T> | null {
    let node: RouteTree<T> | null = this;
    for (const segment of segments) {
      if (!node) {
        return null;
      }
      switch (segment.kind) {
        case "static":
          node = node.staticChildren.get(segment.value) ?? null;
          break;
        case "variable":
          node = node.variableChild;
          break;
        case "wildcard":
          node = node.wildcardChild;
          break;
      }
    }
    return node;
  }

  private descend(
    segments: readonly Segment[],
    variableNames: string[],
  ): RouteTree<T> {
    let node: RouteTree<T> = this;
    for (const segment of segments) {
      if (segment.kind === "variable") {
        variableNames.push(segment.name);
      }
      node = node.child(segment);
    }
    return node;
  }
}

function collectRoutes<T>(
  node: RouteTree<T>,
  path: Segment[],
  out: Route<T>[],
): void {
  for (const [method, item] of node.items) {
    out.push({
      method,
      pattern: formatPattern(path, item.variableNames),
      handler: item.handler,
    });
  }

  for (const [value, child] of node.staticChildren) {
    collectRoutes(child, [...path, { kind: "static", value }], out);
  }

  if (node.variableChild) {
    collectRoutes(
      node.variableChild,
      [...path, { kind: "variable", name: "" }],
      out,
    );
  }

  if (node.wildcardChild) {
    collectRoutes(node.wildcardChild, [...path, { kind: "wildcard" }], out);
  }
}
