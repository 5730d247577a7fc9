import type {
  LogData,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
} from "./types.ts";

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const levelColors: Record<LogLevel, string> = {
  trace: colors.gray,
  debug: colors.blue,
  info: colors.green,
  warn: colors.yellow,
  error: colors.red,
  fatal: colors.magenta,
  silent: "",
};

const writeToProcess: LogWriter = (line, level) => {
  if (level === "error" || level === "fatal") {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
};

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

interface LogEntry {
  level: LogLevel;
  time: number;
  msg: string;
  [key: string]: unknown;
}

function formatPretty(
  entry: LogEntry,
  name: string | undefined,
  showTimestamp: boolean,
): string {
  const { level, time, msg, ...rest } = entry;
  const levelStr = level.toUpperCase().padEnd(5);

  let line = "";

  if (showTimestamp) {
    line += `${colors.gray}${formatTime(time)}${colors.reset} `;
  }

  if (name) {
    line += `${colors.cyan}${colors.bold}[${name}]${colors.reset} `;
  }

  line += `${levelColors[level]}${levelStr}${colors.reset} ${msg}`;

  const extra = Object.entries(rest)
    .map(([key, value]) => {
      const text = typeof value === "string" ? value : JSON.stringify(value);
      return `${colors.dim}${key}=${colors.reset}${text}`;
    })
    .join(" ");

  return extra ? `${line} ${extra}\n` : `${line}\n`;
}

function formatJson(entry: LogEntry, name: string | undefined): string {
  const obj: Record<string, unknown> = name ? { ...entry, name } : entry;
  return JSON.stringify(obj) + "\n";
}

const RESERVED_FIELDS = new Set(["level", "time", "msg"]);

function assignFields(entry: LogEntry, fields: LogData): void {
  for (const [key, value] of Object.entries(fields)) {
    if (!RESERVED_FIELDS.has(key)) entry[key] = value;
  }
}

export function createLogger(options: LoggerConfig = {}): Logger {
  return buildLogger(options, {});
}

function buildLogger(options: LoggerConfig, bindings: LogData): Logger {
  const threshold = LOG_LEVELS[options.level ?? "info"];
  const name = options.name;
  const showTimestamp = options.timestamp ?? true;
  const write = options.write ?? writeToProcess;

  const log = (level: LogLevel, msg: string, data?: LogData): void => {
    if (LOG_LEVELS[level] < threshold) return;

    const entry: LogEntry = { level, time: Date.now(), msg };
    assignFields(entry, bindings);
    if (data) assignFields(entry, data);

    write(
      options.json
        ? formatJson(entry, name)
        : formatPretty(entry, name, showTimestamp),
      level,
    );
  };

  return {
    trace: (msg, data) => log("trace", msg, data),
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    fatal: (msg, data) => log("fatal", msg, data),
    child(childBindings: LogData): Logger {
      const { name: childName, ...rest } = childBindings;
      const joined = childName === undefined
        ? name
        : name
        ? `${name}:${String(childName)}`
        : String(childName);

      return buildLogger(
        { ...options, name: joined },
        { ...bindings, ...rest },
      );
    },
  };
}

/**
 * A logger that drops everything.
 */
export const silentLogger: Logger = createLogger({ level: "silent" });

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "info" in value &&
    "error" in value &&
    "child" in value &&
    typeof value.info === "function" &&
    typeof value.error === "function" &&
    typeof value.child === "function"
  );
}
