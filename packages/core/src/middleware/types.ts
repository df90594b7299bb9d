/**
 * Middleware type definitions.
 */

import type { Context } from "../context/context.ts";

/**
 * Middleware function signature.
 *
 * Middleware can:
 * - Read the request and share data through `ctx.state`
 * - Return a Response to short-circuit the chain
 * - Call next() to continue to the next middleware or the router
 *
 * @example
 * ```typescript
 * const poweredBy: Middleware = async (_ctx, next) => {
 *   const response = await next();
 *   response.headers.set("X-Powered-By", "tracker");
 *   return response;
 * };
 * ```
 */
export type Middleware = (
  ctx: Context,
  next: () => Promise<Response>,
) => Promise<Response>;
