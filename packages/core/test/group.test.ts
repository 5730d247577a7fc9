import { describe, expect, it } from "vitest";
import { RouteConflictError } from "@ramify/router";
import { Ramify } from "../src/app/ramify.ts";
import { RamifyGroup } from "../src/app/group.ts";

function get(app: Ramify, path: string, init?: RequestInit) {
  return app.fetch(new Request(`http://localhost${path}`, init));
}

describe("group()", () => {
  it("should register routes below the group prefix", async () => {
    const app = new Ramify({ logger: false }).group("/users", (users) => {
      users.get("/", () => "list");
      users.get("/:id", (ctx) => `show ${ctx.params.id}`);
      users.post("/", () => "create");
    });

    expect(await (await get(app, "/users")).text()).toBe("list");
    expect(await (await get(app, "/users/7")).text()).toBe("show 7");
    expect(await (await get(app, "/users", { method: "POST" })).text()).toBe(
      "create",
    );
  });

  it("should bind variables from the group prefix first", async () => {
    const app = new Ramify({ logger: false }).group("/orgs/:org", (org) => {
      org.get("/users/:id", (ctx) => ctx.bindings);
    });

    const response = await get(app, "/orgs/acme/users/7");

    expect(await response.json()).toEqual([["org", "acme"], ["id", "7"]]);
  });

  it("should nest groups", async () => {
    const app = new Ramify({ prefix: "/api", logger: false }).group(
      "/v1",
      (v1) => {
        v1.group("/users", (users) => {
          users.get("/:id", (ctx) => ctx.params.id);
        });
      },
    );

    expect(await (await get(app, "/api/v1/users/3")).text()).toBe("3");
    expect(app.getRoutes().map((route) => route.pattern)).toEqual([
      "/api/v1/users/:id",
    ]);
  });

  it("should share the app's duplicate policy", () => {
    const app = new Ramify({
      logger: false,
      router: { duplicates: "reject" },
    }).get("/users", () => "app");

    expect(() =>
      app.group("/users", (users) => {
        users.get("/", () => "group");
      })
    ).toThrow(new RouteConflictError("GET", "/users").message);
  });

  it("should reject duplicates inside a rejecting group", () => {
    const group = new RamifyGroup({ duplicates: "reject" }).get("/", () => 1);

    expect(() => group.get("/", () => 2)).toThrow(RouteConflictError);
  });

  it("should accept untyped definitions", async () => {
    const app = new Ramify({ logger: false }).group("/admin", (admin) => {
      admin.routes([["GET", "/stats", () => ({ users: 1 })]]);
    });

    expect(await (await get(app, "/admin/stats")).json()).toEqual({
      users: 1,
    });
  });
});
