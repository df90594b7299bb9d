/**
 * Error handling middleware.
 */

import type { Logger } from "../../app/types.ts";
import type { Context } from "../../context/context.ts";
import { defaultErrorTransformer } from "../../errors/transformer.ts";
import type { ErrorTransformer } from "../../errors/types.ts";
import type { Middleware } from "../types.ts";

export interface ErrorHandlerOptions {
  logger?: Logger;
  /** Include details and stack traces in error bodies */
  development?: boolean;
  transformer?: ErrorTransformer;
  /** Takes over the response; return null to fall back to the default */
  onError?: (
    error: unknown,
    ctx: Context,
  ) => Response | null | Promise<Response | null>;
}

/**
 * Catch errors from downstream middleware and the router and turn them into
 * error responses.
 *
 * Expected errors such as a 404 pass through quietly. Anything else is
 * logged at `error`. `App` already runs one of these outside all other
 * middleware; add another only to handle errors differently for the
 * layers inside it.
 *
 * @example
 * ```typescript
 * app.use(errorHandler({
 *   onError: (_error, ctx) => ctx.text("Down for maintenance", 503),
 * }));
 * ```
 */
export function errorHandler(options: ErrorHandlerOptions = {}): Middleware {
  const transform = options.transformer ?? defaultErrorTransformer;

  return async (ctx, next) => {
    try {
      return await next();
    } catch (error) {
      const trackerError = transform(error);

      if (!trackerError.isOperational) {
        options.logger?.error("Request failed", {
          method: ctx.method,
          path: ctx.path,
          error: trackerError.message,
          stack: error instanceof Error ? error.stack : undefined,
        });
      }

      if (options.onError) {
        const custom = await options.onError(error, ctx);
        if (custom) return custom;
      }

      return trackerError.toResponse(options.development ?? false);
    }
  };
}
