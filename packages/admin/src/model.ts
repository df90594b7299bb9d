import type { Static, TObject } from "@sinclair/typebox";
import { ImproperlyConfiguredError } from "@tracker/core";
import type { ModelDefinition } from "./types.ts";

export interface ModelConfig<TSchema extends TObject> {
  name: string;
  /** Defaults to the lowercased name plus "s" */
  label?: string;
  schema: TSchema;
  /** Defaults to "id" */
  primaryKey?: string;
  /** Defaults to "<name> object (<pk>)" */
  display?: (instance: Static<TSchema>) => string;
}

/**
 * Describe a model for the admin site.
 *
 * @example
 * ```typescript
 * const Course = defineModel({
 *   name: "Course",
 *   schema: t.Object({ id: t.Integer(), title: t.String() }),
 *   display: (course) => course.title,
 * });
 * ```
 */
export function defineModel<TSchema extends TObject>(
  config: ModelConfig<TSchema>,
): ModelDefinition<TSchema> {
  const primaryKey = config.primaryKey ?? "id";
  if (!Object.hasOwn(config.schema.properties, primaryKey)) {
    throw new ImproperlyConfiguredError(
      `Model ${config.name} has no primary key field "${primaryKey}"`,
    );
  }

  const display = config.display ??
    ((instance: Static<TSchema>) =>
      `${config.name} object (${String(readField(instance, primaryKey))})`);

  return Object.freeze({
    name: config.name,
    label: config.label ?? `${config.name.toLowerCase()}s`,
    schema: config.schema,
    primaryKey,
    display,
  });
}

export function fieldNames(model: ModelDefinition): string[] {
  return Object.keys(model.schema.properties);
}

export function readField(instance: unknown, field: string): unknown {
  if (typeof instance !== "object" || instance === null) return undefined;
  return Object.hasOwn(instance, field)
    ? Reflect.get(instance, field)
    : undefined;
}
