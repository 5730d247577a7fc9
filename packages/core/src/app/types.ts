import type { Context } from "../context/context.ts";

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export type LogData = Record<string, unknown>;

/**
 * Receives each formatted line. Defaults to stdout, or stderr for error
 * and fatal.
 */
export type LogWriter = (line: string, level: LogLevel) => void;

export interface LoggerConfig {
  /** Minimum level to emit (default: "info") */
  level?: LogLevel;
  name?: string;
  /** Prefix pretty lines with HH:MM:SS.mmm (default: true) */
  timestamp?: boolean;
  /** One JSON object per line instead of colored text */
  json?: boolean;
  write?: LogWriter;
}

export interface Logger {
  trace(msg: string, data?: LogData): void;
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  fatal(msg: string, data?: LogData): void;
  /**
   * Derive a logger that adds `bindings` to every entry. A `name` binding
   * is appended to the parent name as `parent:child`.
   */
  child(bindings: LogData): Logger;
}

/**
 * What route handlers receive and return. Anything that is not a
 * `Response` goes through the result conversion in `fetch`.
 */
export type Handler = (ctx: Context) => unknown;

export interface ServerHandle {
  readonly port: number;
  readonly hostname: string;
  close(): Promise<void>;
}
