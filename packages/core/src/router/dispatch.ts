/**
 * The one place where routing failures become HTTP errors.
 */

import type { Context } from "../context/context.ts";
import { MethodNotAllowedError, NotFoundError } from "../errors/http.ts";
import type { Router } from "./router.ts";
import type { HandlerResult } from "./types.ts";

/**
 * Resolve the context's request and run the matching handler.
 *
 * On a match, `ctx.params` and `ctx.routeName` are set before the handler
 * is called.
 *
 * @throws {NotFoundError} When no route matches, including when a typed
 * segment does not parse
 * @throws {MethodNotAllowedError} When the path matches only routes for
 * other methods
 */
export async function dispatch(
  router: Router,
  ctx: Context,
): Promise<HandlerResult> {
  const resolution = await router.resolve(ctx.method, ctx.path);

  switch (resolution.status) {
    case "not_found":
      throw new NotFoundError(`No route matches ${ctx.path}`, {
        path: ctx.path,
      });
    case "method_not_allowed":
      throw new MethodNotAllowedError(resolution.allowed);
    case "matched": {
      ctx.params = resolution.params;
      ctx.routeName = resolution.route.definition.name;
      return await resolution.route.definition.handler(ctx);
    }
  }
}
