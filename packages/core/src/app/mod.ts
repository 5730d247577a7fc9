export { Ramify } from "./ramify.ts";
export { RamifyGroup } from "./group.ts";
export { isRequestMethod, RouteMethods } from "./methods.ts";
export type { RequestMethod } from "./methods.ts";
export { createLogger, isLogger, silentLogger } from "./logger.ts";
export {
  decodePath,
  joinPath,
  NOT_FOUND_BODY,
  resultToResponse,
} from "./helpers.ts";
export type {
  Handler,
  LogData,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
  ServerHandle,
} from "./types.ts";
