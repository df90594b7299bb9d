import type { ErrorTransformer } from "../errors/types.ts";
import type { ErrorHandlerOptions } from "../middleware/builtin/error-handler.ts";

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export type LogFn = (msg: string, data?: Record<string, unknown>) => void;

export interface Logger {
  readonly level: LogLevel;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
  json?: boolean;
}

export interface AppOptions {
  logger?: Logger;
  /** Include error details and stack traces in error responses */
  development?: boolean;
  /**
   * Redirect `GET /foo` to `/foo/` when only the slashed path resolves.
   * Defaults to true.
   */
  appendSlash?: boolean;
  errorTransformer?: ErrorTransformer;
  /** Takes over an error response; return null for the default body */
  onError?: ErrorHandlerOptions["onError"];
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
  onListen?: (params: { hostname: string; port: number }) => void;
}
