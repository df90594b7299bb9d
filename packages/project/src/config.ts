import {
  ConfigError,
  type LogLevel,
  type Static,
  t,
  validate,
} from "@tracker/core";

const ConfigSchema = t.Object({
  PORT: t.Integer({ minimum: 0, maximum: 65535, default: 8000 }),
  HOST: t.String({ minLength: 1, default: "0.0.0.0" }),
  LOG_LEVEL: t.Union(
    [
      t.Literal("trace"),
      t.Literal("debug"),
      t.Literal("info"),
      t.Literal("warn"),
      t.Literal("error"),
      t.Literal("fatal"),
      t.Literal("silent"),
    ],
    { default: "info" },
  ),
  LOG_FORMAT: t.Union([t.Literal("pretty"), t.Literal("json")], {
    default: "pretty",
  }),
  NODE_ENV: t.Union(
    [t.Literal("development"), t.Literal("production"), t.Literal("test")],
    { default: "development" },
  ),
  APPEND_SLASH: t.Boolean({ default: true }),
});

type Env = Static<typeof ConfigSchema>;

export interface TrackerConfig {
  port: number;
  hostname: string;
  logLevel: LogLevel;
  logFormat: "pretty" | "json";
  environment: "development" | "production" | "test";
  appendSlash: boolean;
}

/**
 * Read the configuration from environment variables.
 *
 * Unset variables take their defaults; empty strings count as unset.
 *
 * @throws {ConfigError} Listing every variable that does not fit
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): TrackerConfig {
  const input: Record<string, string> = {};
  for (const key of Object.keys(ConfigSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") {
      input[key] = value;
    }
  }

  const result = validate(ConfigSchema, input, {
    defaults: true,
    convert: true,
  });
  if (!result.success) {
    throw new ConfigError(result.issues);
  }

  return toConfig(result.data);
}

function toConfig(env: Env): TrackerConfig {
  return {
    port: env.PORT,
    hostname: env.HOST,
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
    environment: env.NODE_ENV,
    appendSlash: env.APPEND_SLASH,
  };
}
