import { describe, expect, it } from "vitest";
import { parseConfig, parseListenOptions } from "../src/config/config.ts";
import { silentLogger } from "../src/app/logger.ts";
import { ConfigError } from "../src/errors/http.ts";

describe("parseConfig()", () => {
  it("should fill in defaults", () => {
    expect(parseConfig()).toEqual({
      prefix: "/",
      development: false,
      logger: {},
      router: { duplicates: "replace", wildcard: "lazy" },
    });
  });

  it("should keep given values", () => {
    const config = parseConfig({
      prefix: "/api",
      development: true,
      logger: false,
      router: { wildcard: "greedy" },
    });

    expect(config.prefix).toBe("/api");
    expect(config.development).toBe(true);
    expect(config.logger).toBe(false);
    expect(config.router).toEqual({ duplicates: "replace", wildcard: "greedy" });
  });

  it("should accept a logger instance as is", () => {
    expect(parseConfig({ logger: silentLogger }).logger).toBe(silentLogger);
  });

  it("should reject a prefix without a leading slash", () => {
    expect(() => parseConfig({ prefix: "api" })).toThrow(ConfigError);
    expect(() => parseConfig({ prefix: "api" })).toThrow(
      "Invalid configuration: prefix: Prefix must start with '/'",
    );
  });

  it("should list every issue", () => {
    try {
      parseConfig(JSON.parse('{ "prefix": "api", "development": "yes" }'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe("INVALID_CONFIG");
        expect(error.issues.map((issue) => issue.field)).toEqual([
          "prefix",
          "development",
        ]);
      }
    }
  });
});

describe("parseListenOptions()", () => {
  it("should default to port 8000 on all interfaces", () => {
    expect(parseListenOptions()).toEqual({
      port: 8000,
      hostname: "0.0.0.0",
      serverName: "Ramify",
      contentType: "text/plain; charset=utf-8",
    });
  });

  it("should accept port 0", () => {
    expect(parseListenOptions({ port: 0 }).port).toBe(0);
  });

  it("should reject ports out of range or fractional", () => {
    expect(() => parseListenOptions({ port: 70000 })).toThrow(ConfigError);
    expect(() => parseListenOptions({ port: 80.5 })).toThrow(ConfigError);
    expect(() => parseListenOptions({ hostname: "" })).toThrow(
      "Invalid listen options: hostname:",
    );
  });
});
