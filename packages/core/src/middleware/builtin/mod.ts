/**
 * Built-in middleware exports.
 */

export { errorHandler } from "./error-handler.ts";
export type { ErrorHandlerOptions } from "./error-handler.ts";
export { requestLogger } from "./request-logger.ts";
