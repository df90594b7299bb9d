/**
 * Errors module - structured error handling.
 */

export { TrackerError } from "./base.ts";
export type { TrackerErrorOptions } from "./base.ts";
export {
  BadRequestError,
  InternalError,
  MethodNotAllowedError,
  NotFoundError,
  ValidationError,
} from "./http.ts";
export {
  AlreadyRegisteredError,
  ConfigError,
  ImproperlyConfiguredError,
  NoReverseMatchError,
} from "./framework.ts";
export {
  defaultErrorTransformer,
  errorToResponse,
  isOperationalError,
  isTrackerError,
} from "./transformer.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  ValidationIssue,
} from "./types.ts";
