import { describe, expect, it } from "vitest";
import { RouteConflictError, RouterSealedError } from "@ramify/router";
import { Ramify } from "../src/app/ramify.ts";
import { ConfigError, NotFoundError } from "../src/errors/http.ts";
import type { LoggerConfig } from "../src/app/types.ts";

function get(app: Ramify, path: string, init?: RequestInit) {
  return app.fetch(new Request(`http://localhost${path}`, init));
}

function captureLogs() {
  const entries: Array<Record<string, unknown>> = [];
  const logger: LoggerConfig = {
    level: "debug",
    json: true,
    write: (line) => {
      entries.push(JSON.parse(line));
    },
  };
  return { entries, logger };
}

describe("Ramify", () => {
  describe("constructor", () => {
    it("should reject invalid configuration", () => {
      expect(() => new Ramify({ prefix: "api" })).toThrow(ConfigError);
    });

    it("should expose resolved settings", () => {
      const app = new Ramify({ prefix: "/api", development: true });

      expect(app.prefix).toBe("/api");
      expect(app.development).toBe(true);
      expect(app.isSealed).toBe(false);
    });
  });

  describe("fetch()", () => {
    it("should route static paths", async () => {
      const app = new Ramify({ logger: false }).get("/", () => "Hello");

      const response = await get(app, "/");

      expect(response.status).toBe(200);
      expect(response.headers.get("Content-Type")).toBe(
        "text/plain; charset=utf-8",
      );
      expect(await response.text()).toBe("Hello");
    });

    it("should pass path variables to the handler", async () => {
      const app = new Ramify({ logger: false })
        .get("/users/:userId/posts/:postId", (ctx) => ({
          user: ctx.params.userId,
          post: ctx.params.postId,
          order: ctx.bindings.map(([name]) => name),
        }));

      const response = await get(app, "/users/42/posts/99");

      expect(await response.json()).toEqual({
        user: "42",
        post: "99",
        order: ["userId", "postId"],
      });
    });

    it("should return a plain 404 when nothing matches", async () => {
      const app = new Ramify({ logger: false }).get("/users", () => "list");

      const response = await get(app, "/nothing");

      expect(response.status).toBe(404);
      expect(response.headers.get("Content-Type")).toBe(
        "text/plain; charset=utf-8",
      );
      expect(await response.text()).toBe("Not Found");
    });

    it("should not match another method or an unknown one", async () => {
      const app = new Ramify({ logger: false }).get("/users", () => "list");

      expect((await get(app, "/users", { method: "POST" })).status).toBe(404);
      expect((await get(app, "/users", { method: "HEAD" })).status).toBe(404);
      expect((await get(app, "/users", { method: "BREW" })).status).toBe(404);
    });

    it("should register every method helper", async () => {
      const app = new Ramify({ logger: false })
        .post("/r", () => "post")
        .put("/r", () => "put")
        .patch("/r", () => "patch")
        .delete("/r", () => "delete")
        .options("/r", () => "options")
        .head("/r", () => null)
        .on("GET", "/r", () => "get");

      for (const method of ["POST", "PUT", "PATCH", "DELETE", "OPTIONS"]) {
        const response = await get(app, "/r", { method });
        expect(await response.text()).toBe(method.toLowerCase());
      }
      expect((await get(app, "/r", { method: "HEAD" })).status).toBe(204);
      expect(await (await get(app, "/r")).text()).toBe("get");
    });

    it("should refuse routes for methods a request cannot carry", () => {
      const app = new Ramify({ logger: false });

      expect(() => app.routes([["TRACE", "/r", () => "trace"]])).toThrow(
        "TRACE /r can never be requested",
      );
      expect(() => app.routes([["CONNECT", "/r", () => "connect"]])).toThrow(
        TypeError,
      );
      expect(app.getRoutes()).toEqual([]);
    });

    it("should match wildcards non-greedily by default", async () => {
      const app = new Ramify({ logger: false })
        .get("/files/*", () => "short")
        .get("/files/*/*/*", () => "long");

      expect(await (await get(app, "/files/a")).text()).toBe("short");
      expect(await (await get(app, "/files/a/b/c")).text()).toBe("long");
    });

    it("should honor the greedy wildcard option", async () => {
      const app = new Ramify({ logger: false, router: { wildcard: "greedy" } })
        .get("/files/*", () => "short")
        .get("/files/*/*/*", () => "long");

      expect(await (await get(app, "/files/a/b/c")).text()).toBe("short");
    });

    it("should decode percent-escapes before matching", async () => {
      const app = new Ramify({ logger: false })
        .get("/café", (ctx) => ctx.path)
        .get("/files/:name", (ctx) => ctx.params.name);

      expect(await (await get(app, "/caf%C3%A9")).text()).toBe("/café");
      expect(await (await get(app, "/files/a%20b")).text()).toBe("a b");
      expect(await (await get(app, "/files/a%2Fb")).text()).toBe("a%2Fb");
    });

    it("should decode reserved characters in variables", async () => {
      const app = new Ramify({ logger: false })
        .get("/users/:id", (ctx) => ctx.params.id);

      expect(await (await get(app, "/users/ada%40example.com")).text()).toBe(
        "ada@example.com",
      );
      expect(await (await get(app, "/users/a%3Ab")).text()).toBe("a:b");
      expect(await (await get(app, "/users/a%2Cb%3Bc%26d%3De%2Bf%24")).text())
        .toBe("a,b;c&d=e+f$");
    });

    it("should decode valid escapes around a broken one", async () => {
      const app = new Ramify({ logger: false })
        .get("/users/:id", (ctx) => ctx.params.id);

      expect(await (await get(app, "/users/caf%C3%A9%20100%")).text()).toBe(
        "café 100%",
      );
      expect(await (await get(app, "/users/%zz%41")).text()).toBe("%zzA");
    });

    it("should replace invalid UTF-8 with U+FFFD", async () => {
      const app = new Ramify({ logger: false })
        .get("/files/:name", (ctx) => ctx.params.name);

      expect(await (await get(app, "/files/bad%E0")).text()).toBe(
        "bad\uFFFD",
      );
    });

    it("should keep empty segments from repeated slashes", async () => {
      const app = new Ramify({ logger: false }).get("/path", () => "ok");

      expect((await get(app, "//path")).status).toBe(404);
      expect((await get(app, "/path/")).status).toBe(200);
    });

    it("should convert handler results", async () => {
      const app = new Ramify({ logger: false })
        .get("/none", () => undefined)
        .get("/object", () => ({ ok: true }))
        .get("/bytes", () => new Uint8Array([1, 2, 3]))
        .get("/async", async () => "later")
        .get("/response", (ctx) => ctx.text("made", 201));

      expect((await get(app, "/none")).status).toBe(204);
      expect(await (await get(app, "/object")).json()).toEqual({ ok: true });

      const bytes = await get(app, "/bytes");
      expect(bytes.headers.get("Content-Type")).toBe(
        "application/octet-stream",
      );
      expect(new Uint8Array(await bytes.arrayBuffer())).toEqual(
        new Uint8Array([1, 2, 3]),
      );

      expect(await (await get(app, "/async")).text()).toBe("later");
      expect((await get(app, "/response")).status).toBe(201);
    });

    it("should pick up routes added after the first request", async () => {
      const app = new Ramify({ prefix: "/api", logger: false })
        .get("/a", () => "a");

      expect((await get(app, "/api/b")).status).toBe(404);

      app.get("/b", () => "b");

      expect(await (await get(app, "/api/b")).text()).toBe("b");
    });
  });

  describe("errors", () => {
    it("should turn thrown Ramify errors into JSON responses", async () => {
      const app = new Ramify({ logger: false }).get("/users/:id", (ctx) => {
        throw new NotFoundError(`No user ${ctx.params.id}`);
      });

      const response = await get(app, "/users/7");

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        error: { message: "No user 7", code: "NOT_FOUND", status: 404 },
      });
    });

    it("should map unexpected errors to 500 and log them", async () => {
      const { entries, logger } = captureLogs();
      const app = new Ramify({ logger }).get("/fail", () => {
        throw new Error("boom");
      });

      const response = await get(app, "/fail");

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        error: { message: "boom", code: "INTERNAL_ERROR", status: 500 },
      });

      const errors = entries.filter((entry) => entry.level === "error");
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({
        msg: "boom",
        method: "GET",
        path: "/fail",
        status: 500,
        code: "INTERNAL_ERROR",
      });
    });

    it("should include details in development mode", async () => {
      const app = new Ramify({ logger: false, development: true })
        .get("/fail", () => {
          throw new TypeError("bad type");
        });

      const body = await (await get(app, "/fail")).json();

      expect(body).toMatchObject({
        error: {
          message: "bad type",
          details: { originalName: "TypeError" },
          stack: expect.any(Array),
        },
      });
    });

    it("should answer malformed JSON bodies with 400", async () => {
      const app = new Ramify({ logger: false })
        .post("/items", async (ctx) => await ctx.bodyJson());

      const response = await get(app, "/items", {
        method: "POST",
        body: "{nope",
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { message: "Invalid JSON in request body", code: "BAD_REQUEST" },
      });
    });

    it("should log unmatched requests at debug level", async () => {
      const { entries, logger } = captureLogs();
      const app = new Ramify({ logger });

      await get(app, "/missing");

      expect(entries).toContainEqual(expect.objectContaining({
        level: "debug",
        msg: "No route matched",
        method: "GET",
        path: "/missing",
      }));
    });
  });

  describe("prefix", () => {
    it("should register routes below the prefix", async () => {
      const app = new Ramify({ prefix: "/api", logger: false })
        .get("/users", () => "users")
        .get("/", () => "root");

      expect(await (await get(app, "/api/users")).text()).toBe("users");
      expect(await (await get(app, "/api")).text()).toBe("root");
      expect((await get(app, "/users")).status).toBe(404);
      expect(app.getRoutes().map((route) => route.pattern)).toEqual([
        "/api",
        "/api/users",
      ]);
    });
  });

  describe("routes()", () => {
    it("should register untyped route definitions", async () => {
      const app = new Ramify({ logger: false }).routes([
        ["GET", "/health", () => "ok"],
        { method: "DELETE", pattern: "/items/:id", handler: () => null },
      ]);

      expect(await (await get(app, "/health")).text()).toBe("ok");
      expect((await get(app, "/items/1", { method: "DELETE" })).status).toBe(
        204,
      );
    });
  });

  describe("duplicates", () => {
    it("should let the last registration win by default", async () => {
      const app = new Ramify({ logger: false })
        .get("/", () => "first")
        .get("/", () => "second");

      expect(await (await get(app, "/")).text()).toBe("second");
    });

    it("should throw when configured to reject duplicates", () => {
      const app = new Ramify({
        logger: false,
        router: { duplicates: "reject" },
      }).get("/users/:id", () => "a");

      expect(() => app.get("/users/:uid", () => "b")).toThrow(
        RouteConflictError,
      );
    });
  });

  describe("seal()", () => {
    it("should refuse new routes and keep serving", async () => {
      const app = new Ramify({ logger: false }).get("/", () => "home").seal();

      expect(app.isSealed).toBe(true);
      expect(() => app.get("/x", () => "x")).toThrow(RouterSealedError);
      expect(() => app.get("/x", () => "x")).toThrow(
        "Router is sealed; cannot add GET /x",
      );
      expect(() => app.group("/g", () => undefined)).toThrow(
        RouterSealedError,
      );
      expect(await (await get(app, "/")).text()).toBe("home");
    });
  });
});
