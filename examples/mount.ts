/**
 * Splitting an app into separately built route sets.
 *
 * Run with:
 *   npx tsx examples/mount.ts
 */

import { Ramify } from "../mod.ts";

// users router: can be in a separate file (routes/users.ts)
const usersRouter = new Ramify()
  .get("/", () => ({
    users: [
      { id: 1, name: "Alice" },
      { id: 2, name: "Bob" },
    ],
  }))
  .get("/:id", (ctx) => ({
    org: ctx.bindings[0]?.[1],
    id: ctx.params.id,
  }));

// auth router with its own prefix (routes/auth.ts)
const authRouter = new Ramify({ prefix: "/auth" })
  .get("/login", () => ({ form: "login" }))
  .post("/logout", () => ({ success: true }));

const app = new Ramify({ prefix: "/api" })
  .mount("/orgs/:org/users", usersRouter)
  .mount(authRouter)
  .group("/admin", (admin) => {
    admin.get("/stats", () => ({ uptime: process.uptime() }));
  });

const server = await app.listen({ port: 8000 });

for (const route of app.getRoutes()) {
  app.logger.info(`${route.method} ${route.pattern}`);
}

process.once("SIGINT", () => {
  void server.close();
});
