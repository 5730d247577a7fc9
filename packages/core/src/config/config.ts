/**
 * Application and server configuration, validated with zod.
 */

import { z } from "zod";
import { ConfigError } from "../errors/http.ts";
import { toValidationIssues } from "../errors/zod.ts";
import { isLogger } from "../app/logger.ts";
import type { Logger, LogWriter } from "../app/types.ts";

export const LogLevelSchema = z.enum([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

export const LoggerConfigSchema = z.object({
  level: LogLevelSchema.optional(),
  name: z.string().optional(),
  timestamp: z.boolean().optional(),
  json: z.boolean().optional(),
  write: z
    .custom<LogWriter>((value) => typeof value === "function", {
      message: "Expected a function",
    })
    .optional(),
});

export const RouterConfigSchema = z.object({
  duplicates: z.enum(["replace", "reject"]).default("replace"),
  wildcard: z.enum(["greedy", "lazy"]).default("lazy"),
});

export const RamifyConfigSchema = z.object({
  /** Path every route of the app is registered below */
  prefix: z
    .string()
    .startsWith("/", { message: "Prefix must start with '/'" })
    .default("/"),
  /** Serialize error details and stack traces into responses */
  development: z.boolean().default(false),
  /** A logger, logger options, or false to disable logging */
  logger: z
    .union([
      z.literal(false),
      z.custom<Logger>(isLogger),
      LoggerConfigSchema,
    ])
    .default({}),
  router: RouterConfigSchema.default({}),
});

export const DEFAULT_SERVER_NAME = "Ramify";
export const DEFAULT_CONTENT_TYPE = "text/plain; charset=utf-8";

export const ListenOptionsSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  hostname: z.string().min(1).default("0.0.0.0"),
  /** Value of the `Server` header on every response */
  serverName: z.string().min(1).default(DEFAULT_SERVER_NAME),
  /** `Content-Type` for responses with a body but no type of their own */
  contentType: z.string().min(1).default(DEFAULT_CONTENT_TYPE),
});

export type RamifyConfig = z.input<typeof RamifyConfigSchema>;
export type ResolvedRamifyConfig = z.output<typeof RamifyConfigSchema>;
export type ListenOptions = z.input<typeof ListenOptionsSchema>;
export type ResolvedListenOptions = z.output<typeof ListenOptionsSchema>;

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    const summary = issues
      .map((issue) =>
        issue.field ? `${issue.field}: ${issue.message}` : issue.message
      )
      .join("; ");
    throw new ConfigError(`Invalid ${what}: ${summary}`, issues);
  }
  return result.data;
}

/**
 * @throws {ConfigError} If any field is invalid
 */
export function parseConfig(input: RamifyConfig = {}): ResolvedRamifyConfig {
  return parseWith(RamifyConfigSchema, input, "configuration");
}

/**
 * @throws {ConfigError} If any option is invalid
 */
export function parseListenOptions(
  input: ListenOptions = {},
): ResolvedListenOptions {
  return parseWith(ListenOptionsSchema, input, "listen options");
}
