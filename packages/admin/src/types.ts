/**
 * Type definitions for admin registration.
 */

import type { Static, TObject } from "@sinclair/typebox";

/**
 * Column name standing for the model's display string.
 */
export const DISPLAY_FIELD = "__display__";

/**
 * A data model as the admin site sees it.
 */
export interface ModelDefinition<TSchema extends TObject = TObject> {
  /** Unique model name, e.g. "User" */
  readonly name: string;
  /** Human-readable plural, e.g. "users" */
  readonly label: string;
  readonly schema: TSchema;
  /** Field holding the primary key */
  readonly primaryKey: string;
  /** Display string of one instance */
  display(instance: Static<TSchema>): string;
}

export interface Fieldset {
  /** null for the untitled first set */
  readonly title: string | null;
  readonly fields: readonly string[];
  readonly description?: string;
}

/**
 * How a registered model is presented by an admin UI.
 *
 * Field names must exist on the model's schema; `listDisplay` may also use
 * {@link DISPLAY_FIELD}.
 */
export interface AdminPresentation {
  readonly listDisplay: readonly string[];
  readonly listFilter: readonly string[];
  readonly searchFields: readonly string[];
  /** "-field" sorts descending */
  readonly ordering: readonly string[];
  /** null shows every field in a single set */
  readonly fieldsets: readonly Fieldset[] | null;
  readonly readonlyFields: readonly string[];
}

export interface AdminRegistration {
  readonly model: ModelDefinition;
  /** Left out: the default presentation */
  readonly presentation?: Partial<AdminPresentation>;
}

export interface AdminEntry {
  readonly model: ModelDefinition;
  readonly presentation: AdminPresentation;
}

export interface ListRow {
  readonly pk: unknown;
  /** One value per `listDisplay` column, in order */
  readonly values: readonly unknown[];
}

export interface ChangelistOptions {
  /** Case-insensitive text matched against `searchFields` */
  query?: string;
}

export interface Changelist {
  readonly columns: readonly string[];
  readonly rows: readonly ListRow[];
}
