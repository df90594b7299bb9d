/**
 * Consistency checks between a model and its presentation.
 */

import { fieldNames } from "./model.ts";
import type { AdminPresentation, ModelDefinition } from "./types.ts";
import { DISPLAY_FIELD } from "./types.ts";

export interface CheckIssue {
  /** Presentation option the issue was found in */
  option: keyof AdminPresentation;
  message: string;
}

/**
 * List every field a presentation names that its model does not have.
 *
 * Also reports a field placed in more than one fieldset.
 */
export function checkPresentation(
  model: ModelDefinition,
  presentation: AdminPresentation,
): CheckIssue[] {
  const fields = new Set(fieldNames(model));
  const issues: CheckIssue[] = [];

  const require = (
    option: keyof AdminPresentation,
    names: readonly string[],
    allowDisplay = false,
  ) => {
    for (const name of names) {
      if (allowDisplay && name === DISPLAY_FIELD) continue;
      if (!fields.has(name)) {
        issues.push({
          option,
          message: `"${name}" is not a field of ${model.name}`,
        });
      }
    }
  };

  require("listDisplay", presentation.listDisplay, true);
  require("listFilter", presentation.listFilter);
  require("searchFields", presentation.searchFields);
  require(
    "ordering",
    presentation.ordering.map((field) =>
      field.startsWith("-") ? field.slice(1) : field
    ),
  );
  require("readonlyFields", presentation.readonlyFields);

  if (presentation.fieldsets) {
    const placed = new Set<string>();
    for (const fieldset of presentation.fieldsets) {
      require("fieldsets", fieldset.fields);
      for (const field of fieldset.fields) {
        if (placed.has(field)) {
          issues.push({
            option: "fieldsets",
            message: `"${field}" appears in more than one fieldset`,
          });
        }
        placed.add(field);
      }
    }
  }

  return issues;
}
