import { ConfigError } from "@tracker/core";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.ts";

describe("loadConfig()", () => {
  it("should apply defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      hostname: "0.0.0.0",
      logLevel: "info",
      logFormat: "pretty",
      environment: "development",
      appendSlash: true,
    });
  });

  it("should convert numbers and booleans", () => {
    const config = loadConfig({
      PORT: "3000",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      LOG_FORMAT: "json",
      NODE_ENV: "production",
      APPEND_SLASH: "false",
    });

    expect(config).toEqual({
      port: 3000,
      hostname: "127.0.0.1",
      logLevel: "debug",
      logFormat: "json",
      environment: "production",
      appendSlash: false,
    });
  });

  it("should treat empty strings as unset", () => {
    expect(loadConfig({ PORT: "", HOST: "" }).port).toBe(8000);
  });

  it("should ignore unrelated variables", () => {
    expect(loadConfig({ HOME: "/root" }).hostname).toBe("0.0.0.0");
  });

  it("should list every bad variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "eighty", LOG_LEVEL: "loud" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.field)).toEqual([
        "PORT",
        "LOG_LEVEL",
      ]);
      expect(caught.status).toBe(500);
    }
  });

  it("should reject ports out of range", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ConfigError);
  });
});
