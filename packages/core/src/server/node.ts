/**
 * Serve a fetch-style handler over Node's http module.
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { ListenOptions, Logger } from "../app/types.ts";
import { TrackerError } from "../errors/base.ts";
import { BadRequestError } from "../errors/http.ts";

export type FetchHandler = (request: Request) => Promise<Response>;

export interface ServerHandle {
  readonly hostname: string;
  readonly port: number;
  close(): Promise<void>;
}

export interface ServeOptions extends ListenOptions {
  logger?: Logger;
}

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

const ABSOLUTE_TARGET = /^[a-z][a-z0-9+.-]*:\/\//i;

function parseUrl(raw: string): URL | undefined {
  try {
    return new URL(raw);
  } catch {
    return undefined;
  }
}

/**
 * Full URL of a request target.
 *
 * Origin-form targets are appended to the host, never resolved against it,
 * so "//courses/" stays a path.
 *
 * @throws {BadRequestError} If the target or host does not form a URL
 */
export function requestUrl(target: string, host: string): URL {
  const raw = target.startsWith("/")
    ? `http://${host}${target}`
    : ABSOLUTE_TARGET.test(target)
    ? target
    : null;
  const url = raw === null ? undefined : parseUrl(raw);
  if (!url) {
    throw new BadRequestError("Malformed request target", { target, host });
  }
  return url;
}

/**
 * Convert a Node request into a web Request.
 *
 * @throws {BadRequestError} If the request line does not form a URL
 */
export async function toWebRequest(
  req: IncomingMessage,
  fallbackHost: string,
): Promise<Request> {
  const host = req.headers.host ?? fallbackHost;
  const url = requestUrl(req.url ?? "/", host);

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else {
      headers.set(key, value);
    }
  }

  const method = req.method ?? "GET";
  const body = BODYLESS_METHODS.has(method) ? null : await readBody(req);

  return new Request(url, {
    method,
    headers,
    body: body && body.length > 0 ? body : null,
  });
}

/**
 * Write a web Response to a Node response.
 */
export async function writeWebResponse(
  res: ServerResponse,
  response: Response,
): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });

  if (!response.body) {
    res.end();
    return;
  }

  const body = Buffer.from(await response.arrayBuffer());
  res.end(body);
}

async function respond(
  req: IncomingMessage,
  res: ServerResponse,
  handler: FetchHandler,
  fallbackHost: string,
): Promise<void> {
  let response: Response;
  try {
    response = await handler(await toWebRequest(req, fallbackHost));
  } catch (error) {
    if (!(error instanceof TrackerError && error.isOperational)) throw error;
    response = error.toResponse();
  }
  await writeWebResponse(res, response);
}

function listenOn(
  server: Server,
  port: number,
  hostname: string,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, hostname, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

/**
 * Start an HTTP server for a fetch-style handler.
 *
 * Resolves once the server is listening. Port 0 picks a free port; the
 * handle reports the one in use.
 *
 * @example
 * ```typescript
 * const server = await serve(app.fetch, { port: 8000 });
 * await server.close();
 * ```
 */
export async function serve(
  handler: FetchHandler,
  options: ServeOptions = {},
): Promise<ServerHandle> {
  const port = options.port ?? 8000;
  const hostname = options.hostname ?? "0.0.0.0";
  const logger = options.logger;

  const server = createServer((req, res) => {
    respond(req, res, handler, `${hostname}:${port}`)
      .catch((error: unknown) => {
        logger?.error("Unhandled server error", {
          error: error instanceof Error ? error.message : String(error),
        });
        if (!res.headersSent) {
          res.statusCode = 500;
          res.setHeader("Content-Type", "text/plain; charset=utf-8");
        }
        res.end("Internal Server Error");
      });
  });

  await listenOn(server, port, hostname);

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null
    ? address.port
    : port;

  options.onListen?.({ hostname, port: actualPort });

  return {
    hostname,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
