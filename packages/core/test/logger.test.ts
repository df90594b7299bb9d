import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, isLogger, isLogLevel } from "../src/app/mod.ts";

describe("createLogger()", () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write JSON lines with name and data", () => {
    const logger = createLogger({ name: "tracker", json: true });

    logger.info("listening", { port: 8000 });

    expect(stdout).toHaveLength(1);
    expect(stdout[0].endsWith("\n")).toBe(true);
    expect(JSON.parse(stdout[0])).toMatchObject({
      level: "info",
      msg: "listening",
      port: 8000,
      name: "tracker",
      time: expect.any(Number),
    });
  });

  it("should write bigint values as digit strings", () => {
    const logger = createLogger({ json: true });

    logger.info("event", { params: { eventId: 9007199254740993n } });

    expect(JSON.parse(stdout[0]).params).toEqual({
      eventId: "9007199254740993",
    });
  });

  it("should skip entries below the level", () => {
    const logger = createLogger({ level: "warn", json: true });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(stdout.map((line) => JSON.parse(line).msg)).toEqual(["shown"]);
  });

  it("should write nothing when silent", () => {
    const logger = createLogger({ level: "silent" });

    logger.fatal("nobody hears this");

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([]);
  });

  it("should send error and fatal to stderr", () => {
    const logger = createLogger({ json: true });

    logger.error("failed");
    logger.fatal("crashed");

    expect(stdout).toEqual([]);
    expect(stderr.map((line) => JSON.parse(line).level)).toEqual([
      "error",
      "fatal",
    ]);
  });

  it("should format pretty lines", () => {
    const logger = createLogger({ name: "app", timestamp: false });

    logger.info("started", { port: 1 });

    expect(stdout[0]).toBe(
      "\x1b[36m\x1b[1m[app]\x1b[0m \x1b[32mINFO \x1b[0m started \x1b[2mport=\x1b[0m1\n",
    );
  });

  it("should join child names and keep bindings", () => {
    const logger = createLogger({ name: "tracker", json: true });
    const child = logger.child({ name: "http", requestId: "r1" });
    const grandchild = child.child({ name: "router" });

    child.info("request");
    grandchild.info("resolved");

    expect(JSON.parse(stdout[0])).toMatchObject({
      name: "tracker:http",
      requestId: "r1",
    });
    expect(JSON.parse(stdout[1])).toMatchObject({
      name: "tracker:http:router",
      requestId: "r1",
    });
  });

  it("should not let bindings override the entry fields", () => {
    const logger = createLogger({ json: true }).child({ msg: "bound" });

    logger.info("actual");

    expect(JSON.parse(stdout[0]).msg).toBe("actual");
  });
});

describe("isLogger()", () => {
  it("should accept loggers and reject other values", () => {
    expect(isLogger(createLogger())).toBe(true);
    expect(isLogger({ info: () => {} })).toBe(false);
    expect(isLogger(null)).toBe(false);
  });
});

describe("isLogLevel()", () => {
  it("should accept known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(30)).toBe(false);
  });
});
