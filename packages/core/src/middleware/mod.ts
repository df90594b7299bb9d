/**
 * Middleware module - composition and built-in middleware.
 */

export type { Middleware } from "./types.ts";
export { compose } from "./compose.ts";
export {
  errorHandler,
  type ErrorHandlerOptions,
  requestLogger,
} from "./builtin/mod.ts";
