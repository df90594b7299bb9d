/**
 * Declarative admin registration for Tracker models.
 *
 * @module
 */

export { AdminSite } from "./site.ts";
export { defineModel, fieldNames, readField } from "./model.ts";
export type { ModelConfig } from "./model.ts";
export {
  defaultPresentation,
  resolvePresentation,
  userAdminPresentation,
} from "./presentations.ts";
export { checkPresentation } from "./checks.ts";
export type { CheckIssue } from "./checks.ts";
export { DISPLAY_FIELD } from "./types.ts";
export type {
  AdminEntry,
  AdminPresentation,
  AdminRegistration,
  Changelist,
  ChangelistOptions,
  Fieldset,
  ListRow,
  ModelDefinition,
} from "./types.ts";
