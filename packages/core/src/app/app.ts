import type { Context } from "../context/context.ts";
import { createContext } from "../context/context.ts";
import { NotFoundError } from "../errors/http.ts";
import { errorHandler } from "../middleware/builtin/error-handler.ts";
import { compose } from "../middleware/compose.ts";
import type { Middleware } from "../middleware/types.ts";
import { dispatch } from "../router/dispatch.ts";
import { Router } from "../router/router.ts";
import type { RouteTable } from "../router/types.ts";
import { serve, type ServerHandle } from "../server/node.ts";
import { appendSlash, resultToResponse, withoutBody } from "./helpers.ts";
import { createLogger } from "./logger.ts";
import type { AppOptions, ListenOptions, Logger } from "./types.ts";

/**
 * A web application over a fixed route table.
 *
 * @example
 * ```typescript
 * const table = createRouteTable([
 *   path("/", () => "Hello"),
 *   path("/event/:eventId/", (ctx) => `Event ${ctx.params.eventId}`, {
 *     params: { eventId: "int" },
 *   }),
 * ]);
 *
 * const app = new App(table).use(requestLogger(logger));
 * const response = await app.fetch(new Request("http://localhost/event/3/"));
 * ```
 */
export class App {
  readonly router: Router;
  readonly logger: Logger;
  private readonly middleware: Middleware[] = [];
  private chain: Middleware | null = null;
  private readonly appendSlash: boolean;
  /** Outermost layer; every error response is built and logged here */
  private readonly errors: Middleware;

  constructor(table: RouteTable, options: AppOptions = {}) {
    this.router = new Router(table);
    this.logger = options.logger ?? createLogger({ name: "tracker" });
    this.appendSlash = options.appendSlash ?? true;
    this.errors = errorHandler({
      logger: this.logger,
      development: options.development,
      transformer: options.errorTransformer,
      onError: options.onError,
    });
  }

  /**
   * Add middleware. They run in the order they were added, around routing.
   */
  use(...middleware: Middleware[]): this {
    this.middleware.push(...middleware);
    this.chain = null;
    return this;
  }

  fetch = (request: Request): Promise<Response> => {
    return this.handleRequest(request);
  };

  /**
   * Serve the app over HTTP until the returned handle is closed.
   */
  listen(options: ListenOptions = {}): Promise<ServerHandle> {
    return serve(this.fetch, {
      ...options,
      logger: this.logger,
      onListen: options.onListen ?? (({ hostname, port }) => {
        this.logger.info("Listening", { url: `http://${hostname}:${port}/` });
      }),
    });
  }

  private async handleRequest(request: Request): Promise<Response> {
    const ctx = createContext(request);
    const chain = (this.chain ??= compose([this.errors, ...this.middleware]));
    const response = await chain(ctx, () => this.route(ctx));

    return request.method === "HEAD" ? withoutBody(response) : response;
  }

  private async route(ctx: Context): Promise<Response> {
    try {
      return resultToResponse(await dispatch(this.router, ctx));
    } catch (error) {
      if (error instanceof NotFoundError && this.appendSlash) {
        const redirect = await this.slashRedirect(ctx);
        if (redirect) return redirect;
      }
      throw error;
    }
  }

  private async slashRedirect(ctx: Context): Promise<Response | null> {
    if (ctx.method !== "GET" && ctx.method !== "HEAD") return null;

    const slashed = appendSlash(ctx.path);
    if (!slashed) return null;

    const resolution = await this.router.resolve(ctx.method, slashed);
    if (resolution.status !== "matched") return null;

    return ctx.redirect(`${slashed}${ctx.url.search}`, 301);
  }
}
