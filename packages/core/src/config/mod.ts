export {
  DEFAULT_CONTENT_TYPE,
  DEFAULT_SERVER_NAME,
  ListenOptionsSchema,
  LoggerConfigSchema,
  LogLevelSchema,
  parseConfig,
  parseListenOptions,
  RamifyConfigSchema,
  RouterConfigSchema,
} from "./config.ts";
export type {
  ListenOptions,
  RamifyConfig,
  ResolvedListenOptions,
  ResolvedRamifyConfig,
} from "./config.ts";
