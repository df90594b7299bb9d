/**
 * Request context for Tracker.
 *
 * Middleware see the context before routing; the dispatcher then fills in
 * the route's params and name before the handler runs.
 */

const TEXT_HEADERS = Object.freeze({
  "Content-Type": "text/plain; charset=utf-8",
});

/**
 * Request context passed to handlers and middleware.
 *
 * @example
 * ```typescript
 * const courseDetail: Handler<{ pk: string }> = (ctx) =>
 *   `Details for course with id ${ctx.params.pk}`;
 * ```
 */
export class Context<TParams = Record<string, unknown>> {
  /**
   * Original HTTP request.
   */
  readonly request: Request;

  /**
   * Typed route parameters. Empty until a route has matched.
   *
   * @example
   * For route "/event/:eventId/" with an int converter, "/event/12/" gives
   * { eventId: 12n }
   */
  params: TParams;

  /** Name of the matched route, if it has one */
  routeName?: string;

  /**
   * Custom state for sharing data between middleware.
   */
  private _state: Record<string, unknown> | null = null;

  get state(): Record<string, unknown> {
    if (!this._state) {
      const state: Record<string, unknown> = Object.create(null);
      this._state = state;
    }
    return this._state;
  }

  private readonly _url: URL;

  constructor(request: Request, params: TParams) {
    this.request = request;
    this.params = params;
    this._url = new URL(request.url);
  }

  get url(): URL {
    return this._url;
  }

  get method(): string {
    return this.request.method;
  }

  get headers(): Headers {
    return this.request.headers;
  }

  /**
   * Path without query string, still percent-encoded.
   */
  get path(): string {
    return this._url.pathname;
  }

  json(data: unknown, status = 200): Response {
    return Response.json(data, { status });
  }

  text(text: string, status = 200): Response {
    return new Response(text, { status, headers: TEXT_HEADERS });
  }

  redirect(url: string, status = 302): Response {
    return new Response(null, { status, headers: { Location: url } });
  }
}

/**
 * Context for a request that has not been routed yet.
 */
export function createContext(request: Request): Context {
  return new Context<Record<string, unknown>>(request, Object.create(null));
}
