/**
 * Middleware composition utilities.
 */

import type { Context } from "../context/context.ts";
import type { Middleware } from "./types.ts";

/**
 * Compose multiple middleware functions into a single function.
 *
 * Middleware are executed in order, with each calling next() to proceed.
 * If a middleware returns a Response without calling next(), the chain stops.
 *
 * @example
 * ```typescript
 * const composed = compose([requestLogger(logger), errorHandler()]);
 * const response = await composed(ctx, () => handle(ctx));
 * ```
 */
export function compose(middleware: readonly Middleware[]): Middleware {
  for (const fn of middleware) {
    if (typeof fn !== "function") {
      throw new TypeError("Middleware must be composed of functions");
    }
  }

  const len = middleware.length;

  if (len === 0) {
    return (_ctx, next) => next();
  }

  return function composedMiddleware(
    ctx: Context,
    next: () => Promise<Response>,
  ): Promise<Response> {
    let index = -1;

    function run(i: number): Promise<Response> {
      if (i <= index) {
        return Promise.reject(new Error("next() called multiple times"));
      }
      index = i;
      if (i === len) {
        return next();
      }
      try {
        return Promise.resolve(middleware[i](ctx, () => run(i + 1)));
      } catch (error) {
        return Promise.reject(error);
      }
    }

    return run(0);
  };
}
