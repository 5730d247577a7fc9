export { Context } from "./context.ts";
export type { RouteResult } from "./context.ts";
export { parseParameters } from "./params.ts";
