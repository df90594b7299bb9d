import type { Static, TSchema } from "@sinclair/typebox";
import { FormatRegistry } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "../errors/http.ts";
import type { ValidationIssue } from "../errors/types.ts";
import { formatPointer } from "./errors.ts";
import type { ValidationResult } from "./types.ts";

if (!FormatRegistry.Has("email")) {
  FormatRegistry.Set("email", (v) => /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(v));
}
if (!FormatRegistry.Has("date-time")) {
  FormatRegistry.Set("date-time", (v) => !isNaN(Date.parse(v)));
}

export interface ValidateOptions {
  /** Fill in schema defaults before checking */
  defaults?: boolean;
  /** Coerce strings to the numbers and booleans the schema asks for */
  convert?: boolean;
}

/**
 * Check data against a TypeBox schema.
 *
 * With `defaults` and `convert` this also parses loosely typed input such
 * as environment variables.
 */
export function validate<T extends TSchema>(
  schema: T,
  data: unknown,
  options: ValidateOptions = {},
): ValidationResult<Static<T>> {
  let value = data;
  if (options.defaults) {
    value = Value.Default(schema, Value.Clone(value));
  }
  if (options.convert) {
    value = Value.Convert(schema, value);
  }

  if (Value.Check(schema, value)) {
    return { success: true, data: value };
  }

  const issues: ValidationIssue[] = [...Value.Errors(schema, value)].map((
    err,
  ) => ({
    field: formatPointer(err.path),
    message: err.message,
    code: String(err.type),
  }));

  return { success: false, issues };
}

/**
 * Like {@link validate}, but throws a {@link ValidationError} on failure.
 */
export function validateOrThrow<T extends TSchema>(
  schema: T,
  data: unknown,
  options: ValidateOptions = {},
): Static<T> {
  const result = validate(schema, data, options);

  if (!result.success) {
    throw new ValidationError("Validation failed", result.issues);
  }

  return result.data;
}
