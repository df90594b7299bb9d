export { App } from "./app.ts";
export { createLogger, isLogger, isLogLevel } from "./logger.ts";
export type {
  AppOptions,
  ListenOptions,
  LogFn,
  Logger,
  LoggerConfig,
  LogLevel,
} from "./types.ts";
