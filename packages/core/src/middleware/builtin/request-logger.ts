/**
 * Request logger middleware.
 */

import type { Logger } from "../../app/types.ts";
import { TrackerError } from "../../errors/base.ts";
import type { Middleware } from "../types.ts";

/**
 * Log method, path, status and response time of every request.
 *
 * A request that fails downstream is logged with the status of its error,
 * or 500, and the error is rethrown.
 *
 * @example
 * ```typescript
 * app.use(requestLogger(logger));
 * // INFO  GET /courses/ status=200 durationMs=1
 * ```
 */
export function requestLogger(logger: Logger): Middleware {
  return async (ctx, next) => {
    const start = performance.now();
    let status = 500;
    try {
      const response = await next();
      status = response.status;
      return response;
    } catch (error) {
      if (error instanceof TrackerError) status = error.status;
      throw error;
    } finally {
      logger.info(`${ctx.method} ${ctx.path}`, {
        status,
        durationMs: Math.round(performance.now() - start),
      });
    }
  };
}
