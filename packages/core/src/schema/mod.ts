export { isStandardSchema, validateStandard } from "./standard.ts";
export type { Infer, StandardSchema } from "./standard.ts";
export { validate, validateOrThrow } from "./validator.ts";
export type { ValidateOptions } from "./validator.ts";
export { formatPath, formatPointer } from "./errors.ts";
export type { ValidationResult } from "./types.ts";
