/**
 * @module
 *
 * Ramify: a small HTTP framework routed by a segment tree.
 *
 * @example
 * ```typescript
 * import { Ramify } from "@ramify/core";
 *
 * const app = new Ramify();
 *
 * app.get("/", () => "Hello");
 * app.get("/users/:id", (ctx) => ({ id: ctx.params.id }));
 *
 * await app.listen({ port: 8000 });
 * ```
 */

export * from "./src/mod.ts";
