/**
 * Errors raised while the application is being put together, before any
 * request is served. None of them are operational.
 */

import { TrackerError } from "./base.ts";
import type { ValidationIssue } from "./types.ts";

/**
 * A named route could not be turned back into a path.
 */
export class NoReverseMatchError extends TrackerError {
  constructor(message: string, details?: unknown) {
    super(message, {
      code: "NO_REVERSE_MATCH",
      details,
      operational: false,
    });
    this.name = "NoReverseMatchError";
  }
}

/**
 * Routes, models or presentations that contradict each other.
 */
export class ImproperlyConfiguredError extends TrackerError {
  constructor(message: string, details?: unknown) {
    super(message, {
      code: "IMPROPERLY_CONFIGURED",
      details,
      operational: false,
    });
    this.name = "ImproperlyConfiguredError";
  }
}

/**
 * A model was handed to the admin site more than once.
 */
export class AlreadyRegisteredError extends TrackerError {
  constructor(model: string) {
    super(`Model already registered: ${model}`, {
      code: "ALREADY_REGISTERED",
      details: { model },
      operational: false,
    });
    this.name = "AlreadyRegisteredError";
  }
}

/**
 * Environment variables that do not satisfy the config schema.
 */
export class ConfigError extends TrackerError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Invalid configuration: ${
        issues.map((i) => `${i.field}: ${i.message}`).join(", ")
      }`,
      { code: "INVALID_CONFIG", details: issues, operational: false },
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}
