/**
 * Basic server example demonstrating core Ramify features.
 *
 * Run with:
 *   npm run example
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { NotFoundError, Ramify } from "../mod.ts";

const NewUser = z.object({ name: z.string().min(1) });

const app = new Ramify({ logger: { name: "basic", level: "debug" } })
  .get("/", (ctx) =>
    ctx.json({
      message: "Welcome to Ramify!",
      version: "0.1.0",
    }))
  .get("/users/:id", (ctx) => {
    if (ctx.params.id === "0") {
      throw new NotFoundError("User 0 does not exist");
    }
    return { userId: ctx.params.id, name: `User ${ctx.params.id}` };
  })
  .get("/orgs/:orgId/repos/:repoId", (ctx) => ({
    organization: ctx.params.orgId,
    repository: ctx.params.repoId,
  }))
  .post("/users", async (ctx) => {
    const user = await ctx.bodyJson(NewUser);
    return ctx.json({ created: true, id: randomUUID(), ...user }, 201);
  })
  .get("/files/*", (ctx) => ctx.text(`file at ${ctx.path}`))
  .get("/search", (ctx) => ({ q: ctx.query.get("q") }))
  .delete("/users/:id", (ctx) => ctx.noContent());

const server = await app.listen({ port: 8000, hostname: "127.0.0.1" });

app.logger.info("Try these endpoints", {
  routes: app.getRoutes().map((route) => `${route.method} ${route.pattern}`),
});

process.once("SIGINT", () => {
  server.close().then(
    () => process.exit(0),
    (error: unknown) => {
      app.logger.error("Failed to close server", { error: String(error) });
      process.exit(1);
    },
  );
});
