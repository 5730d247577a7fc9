import type { Segment } from "./types.ts";

// Character codes for fast comparison
const SLASH = 47; // '/'
const COLON = 58; // ':'

export const WILDCARD = "*";

const EMPTY_SEGMENTS: readonly string[] = Object.freeze([]);

/**
 * Split a path into its `/`-delimited segments.
 *
 * One leading and one trailing slash are ignored; anything else is kept as
 * is, so `"//a"` yields `["", "a"]` and never matches a route for `"a"`.
 * No decoding or case folding happens here.
 *
 * @example
 * ```typescript
 * segmentPath("/users/42/"); // ["users", "42"]
 * segmentPath("/"); // []
 * ```
 */
export function segmentPath(path: string): readonly string[] {
  const len = path.length;
  if (len === 0 || (len === 1 && path.charCodeAt(0) === SLASH)) {
    return EMPTY_SEGMENTS;
  }

  const start = path.charCodeAt(0) === SLASH ? 1 : 0;
  const end = path.charCodeAt(len - 1) === SLASH ? len - 1 : len;

  return path.slice(start, end).split("/");
}

/**
 * Classify a pattern segment.
 *
 * `":"` is accepted as a variable with an empty name.
 */
export function parseSegment(segment: string): Segment {
  if (segment === WILDCARD) {
    return { kind: "wildcard" };
  }
  if (segment.charCodeAt(0) === COLON) {
    return { kind: "variable", name: segment.slice(1) };
  }
  return { kind: "static", value: segment };
}

export function parsePattern(pattern: string): Segment[] {
  return segmentPath(pattern.trim()).map(parseSegment);
}

/**
 * Render pattern segments back to a pattern string.
 *
 * Variable segments take their names from `variableNames` in order, since a
 * tree node only knows that it is a variable position.
 */
export function formatPattern(
  segments: readonly Segment[],
  variableNames: readonly string[],
): string {
  let variableIndex = 0;
  const parts = segments.map((segment) => {
    switch (segment.kind) {
      case "static":
        return segment.value;
      case "wildcard":
        return WILDCARD;
      case "variable":
        return `:${variableNames[variableIndex++] ?? segment.name}`;
    }
  });
  return `/${parts.join("/")}`;
}
