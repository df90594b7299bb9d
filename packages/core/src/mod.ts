/**
 * Tracker Core
 *
 * @example
 * ```typescript
 * import { App, createRouteTable, path } from "@tracker/core";
 *
 * const app = new App(createRouteTable([
 *   path("/", () => "Hello"),
 * ]));
 *
 * await app.listen({ port: 8000 });
 * ```
 *
 * @module
 */

import { Type } from "@sinclair/typebox";

/**
 * TypeBox schema builder - use this to define config and model schemas.
 *
 * @example
 * ```typescript
 * const course = t.Object({
 *   id: t.Integer({ minimum: 1 }),
 *   title: t.String({ minLength: 1 }),
 * });
 * ```
 */
export const t = Type;
export type { Static, TSchema } from "@sinclair/typebox";

export { App, createLogger, isLogger, isLogLevel } from "./app/mod.ts";
export type {
  AppOptions,
  ListenOptions,
  LogFn,
  Logger,
  LoggerConfig,
  LogLevel,
} from "./app/mod.ts";

export { Context, createContext } from "./context/mod.ts";

export {
  compose,
  errorHandler,
  requestLogger,
} from "./middleware/mod.ts";
export type { ErrorHandlerOptions, Middleware } from "./middleware/mod.ts";

export {
  AlreadyRegisteredError,
  BadRequestError,
  ConfigError,
  defaultErrorTransformer,
  errorToResponse,
  ImproperlyConfiguredError,
  InternalError,
  isOperationalError,
  isTrackerError,
  MethodNotAllowedError,
  NoReverseMatchError,
  NotFoundError,
  TrackerError,
  ValidationError,
} from "./errors/mod.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  ValidationIssue,
} from "./errors/mod.ts";

export {
  converters,
  createRouteTable,
  dispatch,
  include,
  isConverterName,
  joinPattern,
  path,
  Router,
} from "./router/mod.ts";
export type {
  CompiledRoute,
  Converter,
  ConverterName,
  ConverterTypes,
  ExtractPathParams,
  Handler,
  HandlerResult,
  HttpMethod,
  ParamSpec,
  PathOptions,
  Resolution,
  RouteDefinition,
  RouteParams,
  RouteParamValues,
  RouteTable,
  RouteTableOptions,
} from "./router/mod.ts";

export {
  formatPath,
  formatPointer,
  isStandardSchema,
  validate,
  validateOrThrow,
  validateStandard,
} from "./schema/mod.ts";
export type {
  Infer,
  StandardSchema,
  ValidateOptions,
  ValidationResult,
} from "./schema/mod.ts";

export {
  requestUrl,
  serve,
  toWebRequest,
  writeWebResponse,
} from "./server/mod.ts";
export type { FetchHandler, ServeOptions, ServerHandle } from "./server/mod.ts";
