import type { Logger, LogLevel } from "../src/app/types.ts";

export interface LogRecord {
  level: LogLevel;
  msg: string;
  data?: Record<string, unknown>;
}

/**
 * Logger that keeps every entry in memory.
 */
export function memoryLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const at = (level: LogLevel) => (msg: string, data?: Record<string, unknown>) => {
    records.push({ level, msg, data });
  };

  const logger: Logger = {
    level: "trace",
    trace: at("trace"),
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    fatal: at("fatal"),
    child: () => logger,
  };

  return { logger, records };
}
