import { describe, expect, it } from "vitest";
import {
  formatPattern,
  parsePattern,
  parseSegment,
  segmentPath,
} from "../src/segment.ts";

describe("segmentPath()", () => {
  it("should return no segments for the root", () => {
    expect(segmentPath("")).toEqual([]);
    expect(segmentPath("/")).toEqual([]);
  });

  it("should ignore one leading and one trailing slash", () => {
    expect(segmentPath("path/to/test3")).toEqual(["path", "to", "test3"]);
    expect(segmentPath("/path/to/test3")).toEqual(["path", "to", "test3"]);
    expect(segmentPath("path/to/test3/")).toEqual(["path", "to", "test3"]);
    expect(segmentPath("/path/to/test3/")).toEqual(["path", "to", "test3"]);
  });

  it("should keep empty segments from repeated slashes", () => {
    expect(segmentPath("//path/to/test3")).toEqual([
      "",
      "path",
      "to",
      "test3",
    ]);
    expect(segmentPath("a//b")).toEqual(["a", "", "b"]);
    expect(segmentPath("//")).toEqual([""]);
  });

  it("should treat a single character as one segment", () => {
    expect(segmentPath("a")).toEqual(["a"]);
    expect(segmentPath("*")).toEqual(["*"]);
  });

  it("should not decode or fold case", () => {
    expect(segmentPath("/Users/a%20b")).toEqual(["Users", "a%20b"]);
  });
});

describe("parseSegment()", () => {
  it("should classify wildcards", () => {
    expect(parseSegment("*")).toEqual({ kind: "wildcard" });
  });

  it("should classify variables", () => {
    expect(parseSegment(":id")).toEqual({ kind: "variable", name: "id" });
  });

  it("should accept a variable with an empty name", () => {
    expect(parseSegment(":")).toEqual({ kind: "variable", name: "" });
  });

  it("should treat everything else as static", () => {
    expect(parseSegment("users")).toEqual({ kind: "static", value: "users" });
    expect(parseSegment("*foo")).toEqual({ kind: "static", value: "*foo" });
    expect(parseSegment("a:b")).toEqual({ kind: "static", value: "a:b" });
    expect(parseSegment("")).toEqual({ kind: "static", value: "" });
  });
});

describe("parsePattern()", () => {
  it("should trim whitespace and classify every segment", () => {
    expect(parsePattern("  /files/:owner/*  ")).toEqual([
      { kind: "static", value: "files" },
      { kind: "variable", name: "owner" },
      { kind: "wildcard" },
    ]);
  });
});

describe("formatPattern()", () => {
  it("should render the root as a single slash", () => {
    expect(formatPattern([], [])).toBe("/");
  });

  it("should take variable names from the name list", () => {
    const segments = parsePattern("a/:b/*/:c");
    expect(formatPattern(segments, ["x", "y"])).toBe("/a/:x/*/:y");
  });

  it("should fall back to the segment name", () => {
    const segments = parsePattern("a/:b");
    expect(formatPattern(segments, [])).toBe("/a/:b");
  });
});
