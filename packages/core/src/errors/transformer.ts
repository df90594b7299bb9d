/**
 * Error transformation utilities.
 */

import { TrackerError } from "./base.ts";
import { InternalError } from "./http.ts";
import type { ErrorTransformer } from "./types.ts";

/**
 * Default error transformer.
 * Converts any error to a TrackerError.
 */
export function defaultErrorTransformer(error: unknown): TrackerError {
  if (error instanceof TrackerError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new InternalError("An unexpected error occurred", {
    value: String(error),
  });
}

/**
 * Create an error response from any error.
 */
export function errorToResponse(
  error: unknown,
  development = false,
  transformer: ErrorTransformer = defaultErrorTransformer,
): Response {
  return transformer(error).toResponse(development);
}

/**
 * Type guard to check if a value is a TrackerError.
 */
export function isTrackerError(error: unknown): error is TrackerError {
  return error instanceof TrackerError;
}

/**
 * Type guard to check if an error is operational (expected).
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof TrackerError) {
    return error.isOperational;
  }
  return false;
}
