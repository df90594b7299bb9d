/**
 * The admin site: an explicit list of registered models.
 */

import {
  AlreadyRegisteredError,
  ImproperlyConfiguredError,
  NotFoundError,
  validateOrThrow,
} from "@tracker/core";
import { checkPresentation } from "./checks.ts";
import { readField } from "./model.ts";
import { resolvePresentation } from "./presentations.ts";
import type {
  AdminEntry,
  AdminPresentation,
  AdminRegistration,
  Changelist,
  ChangelistOptions,
  ListRow,
  ModelDefinition,
} from "./types.ts";
import { DISPLAY_FIELD } from "./types.ts";

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return 1;
  if (b === undefined || b === null) return -1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return String(a).localeCompare(String(b));
}

/**
 * Registry of the models an admin UI exposes, and how it shows them.
 *
 * Registrations are fixed at construction; there is no later `register()`.
 *
 * @example
 * ```typescript
 * const site = new AdminSite([
 *   { model: User, presentation: userAdminPresentation },
 *   { model: UserSettings },
 * ]);
 *
 * site.presentationFor("UserSettings").listDisplay; // ["__display__"]
 * ```
 */
export class AdminSite {
  readonly name: string;
  private readonly registry = new Map<string, AdminEntry>();

  /**
   * @throws {AlreadyRegisteredError} If a model is listed twice
   * @throws {ImproperlyConfiguredError} If a presentation names a field its
   * model does not have
   */
  constructor(registrations: readonly AdminRegistration[], name = "admin") {
    this.name = name;

    for (const { model, presentation } of registrations) {
      if (this.registry.has(model.name)) {
        throw new AlreadyRegisteredError(model.name);
      }

      const resolved = resolvePresentation(presentation);
      const issues = checkPresentation(model, resolved);
      if (issues.length > 0) {
        throw new ImproperlyConfiguredError(
          `Invalid admin presentation for ${model.name}: ${
            issues.map((i) => `${i.option}: ${i.message}`).join("; ")
          }`,
          issues,
        );
      }

      this.registry.set(
        model.name,
        Object.freeze({ model, presentation: resolved }),
      );
    }
  }

  isRegistered(model: ModelDefinition | string): boolean {
    const name = typeof model === "string" ? model : model.name;
    const entry = this.registry.get(name);
    if (!entry) return false;
    return typeof model === "string" || entry.model === model;
  }

  get(name: string): AdminEntry | undefined {
    return this.registry.get(name);
  }

  /**
   * @throws {NotFoundError} If the model is not registered
   */
  presentationFor(name: string): AdminPresentation {
    return this.require(name).presentation;
  }

  /**
   * Registered models in registration order.
   */
  entries(): AdminEntry[] {
    return [...this.registry.values()];
  }

  /**
   * The `listDisplay` values of one instance.
   *
   * @throws {ValidationError} If the instance does not fit the model schema
   */
  listRow(name: string, instance: unknown): ListRow {
    const { model, presentation } = this.require(name);
    const valid = validateOrThrow(model.schema, instance);

    return {
      pk: readField(valid, model.primaryKey),
      values: presentation.listDisplay.map((column) =>
        column === DISPLAY_FIELD
          ? model.display(valid)
          : readField(valid, column)
      ),
    };
  }

  /**
   * Rows for a list of instances, filtered by the search fields and sorted
   * by the presentation's ordering.
   */
  changelist(
    name: string,
    instances: readonly unknown[],
    options: ChangelistOptions = {},
  ): Changelist {
    const { model, presentation } = this.require(name);
    const valid = instances.map((instance) =>
      validateOrThrow(model.schema, instance)
    );

    const terms = (options.query ?? "").toLowerCase().split(/\s+/).filter(
      Boolean,
    );
    const matched = terms.length === 0 || presentation.searchFields.length === 0
      ? valid
      : valid.filter((instance) =>
        terms.every((term) =>
          presentation.searchFields.some((field) =>
            String(readField(instance, field) ?? "").toLowerCase().includes(
              term,
            )
          )
        )
      );

    const ordering = presentation.ordering.length > 0
      ? presentation.ordering
      : [`-${model.primaryKey}`];
    const sorted = [...matched].sort((a, b) => {
      for (const key of ordering) {
        const descending = key.startsWith("-");
        const field = descending ? key.slice(1) : key;
        const result = compareValues(readField(a, field), readField(b, field));
        if (result !== 0) return descending ? -result : result;
      }
      return 0;
    });

    return {
      columns: presentation.listDisplay,
      rows: sorted.map((instance) => this.listRow(name, instance)),
    };
  }

  private require(name: string): AdminEntry {
    const entry = this.registry.get(name);
    if (!entry) {
      throw new NotFoundError(`Model not registered: ${name}`);
    }
    return entry;
  }
}
