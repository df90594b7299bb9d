import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { ValidationIssue } from "../errors/types.ts";
import { formatPath } from "./errors.ts";
import type { ValidationResult } from "./types.ts";

/**
 * Any library implementing Standard Schema (Zod, Valibot, ArkType, etc.)
 * can be used directly without wrappers.
 */
export type StandardSchema<TInput = unknown, TOutput = TInput> =
  StandardSchemaV1<TInput, TOutput>;

/**
 * Infer the output type from any Standard Schema compliant schema.
 *
 * @example
 * ```typescript
 * import { z } from "zod";
 * const schema = z.object({ eventId: z.bigint().positive() });
 * type Params = Infer<typeof schema>; // { eventId: bigint }
 * ```
 */
export type Infer<S> = S extends StandardSchemaV1<unknown, infer TOutput>
  ? TOutput
  : never;

/**
 * Check if a value implements the Standard Schema interface.
 */
export function isStandardSchema(value: unknown): value is StandardSchema {
  if (typeof value !== "object" || value === null || !("~standard" in value)) {
    return false;
  }
  const props: unknown = value["~standard"];
  return typeof props === "object" && props !== null &&
    "validate" in props && typeof props.validate === "function";
}

/**
 * Validate data against a Standard Schema.
 *
 * @example
 * ```typescript
 * const result = await validateStandard(z.object({ pk: z.string() }), params);
 * if (!result.success) console.log(result.issues);
 * ```
 */
export async function validateStandard<T extends StandardSchema>(
  schema: T,
  data: unknown,
): Promise<ValidationResult<Infer<T>>> {
  let result = schema["~standard"].validate(data);

  if (result instanceof Promise) {
    result = await result;
  }

  if (result.issues) {
    return {
      success: false,
      issues: result.issues.map((issue): ValidationIssue => ({
        field: formatPath(issue.path),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.value as Infer<T>,
  };
}
