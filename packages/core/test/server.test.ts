import { request as httpRequest } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { App } from "../src/app/mod.ts";
import { BadRequestError } from "../src/errors/mod.ts";
import { createRouteTable, path } from "../src/router/mod.ts";
import {
  requestUrl,
  serve,
  type ServerHandle,
} from "../src/server/mod.ts";
import { memoryLogger } from "./support.ts";

interface RawResponse {
  status: number;
  body: string;
}

/**
 * Send a request line as written, without fetch normalizing its path.
 */
function rawGet(
  port: number,
  target: string,
  headers: Record<string, string> = {},
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = httpRequest(
      { host: "127.0.0.1", port, path: target, method: "GET", headers },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString("utf8"),
          }));
        res.on("error", reject);
      },
    );
    req.on("error", reject);
    req.end();
  });
}

describe("requestUrl()", () => {
  it("should keep a target starting with // as a path", () => {
    const url = requestUrl("//courses/?page=2", "localhost:8000");

    expect(url.host).toBe("localhost:8000");
    expect(url.pathname).toBe("//courses/");
    expect(url.search).toBe("?page=2");
  });

  it("should accept absolute-form targets", () => {
    expect(requestUrl("http://example.com/courses/", "localhost").href).toBe(
      "http://example.com/courses/",
    );
  });

  it("should throw BadRequestError for targets that form no URL", () => {
    expect(() => requestUrl("*", "localhost")).toThrow(BadRequestError);
    expect(() => requestUrl("/courses/", "[")).toThrow(
      "Malformed request target",
    );
  });
});

describe("serve()", () => {
  let server: ServerHandle;
  let base: string;

  beforeAll(async () => {
    const { logger } = memoryLogger();
    const app = new App(
      createRouteTable([
        path("/courses/", () => "List of courses"),
        path("/echo/", async (ctx) => `echo: ${await ctx.request.text()}`, {
          methods: ["POST"],
        }),
        path("/headers/", (ctx) => ctx.json({ agent: ctx.headers.get("x-agent") })),
      ]),
      { logger },
    );

    server = await serve(app.fetch, { port: 0, hostname: "127.0.0.1" });
    base = `http://127.0.0.1:${server.port}`;
  });

  afterAll(async () => {
    await server.close();
  });

  it("should report the port it picked", () => {
    expect(server.port).toBeGreaterThan(0);
    expect(server.hostname).toBe("127.0.0.1");
  });

  it("should serve text responses", async () => {
    const response = await fetch(`${base}/courses/`);

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe(
      "text/plain; charset=utf-8",
    );
    expect(await response.text()).toBe("List of courses");
  });

  it("should pass request bodies through", async () => {
    const response = await fetch(`${base}/echo/`, {
      method: "POST",
      body: "hello",
    });

    expect(await response.text()).toBe("echo: hello");
  });

  it("should pass request headers through", async () => {
    const response = await fetch(`${base}/headers/`, {
      headers: { "X-Agent": "test-agent" },
    });

    expect(await response.json()).toEqual({ agent: "test-agent" });
  });

  it("should not read a leading // as a host", async () => {
    const response = await rawGet(server.port, "//courses/");

    expect(response.status).toBe(404);
    expect(JSON.parse(response.body)).toEqual({
      error: {
        message: "No route matches //courses/",
        code: "NOT_FOUND",
        status: 404,
      },
    });
  });

  it("should answer 404 for odd but parseable targets", async () => {
    expect((await rawGet(server.port, "//[/")).status).toBe(404);
  });

  it("should answer 400 when the host does not form a URL", async () => {
    const response = await rawGet(server.port, "/courses/", { Host: "[" });

    expect(response.status).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      error: {
        message: "Malformed request target",
        code: "BAD_REQUEST",
        status: 400,
      },
    });
  });

  it("should serve error responses", async () => {
    const response = await fetch(`${base}/nope/`);

    expect(response.status).toBe(404);
    expect(response.headers.get("content-type")).toBe(
      "application/json; charset=utf-8",
    );
  });
});
