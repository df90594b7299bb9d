/**
 * Presentation descriptors.
 */

import type { AdminPresentation } from "./types.ts";
import { DISPLAY_FIELD } from "./types.ts";

/**
 * Lists each instance by its display string and nothing more.
 */
export const defaultPresentation: AdminPresentation = Object.freeze({
  listDisplay: [DISPLAY_FIELD],
  listFilter: [],
  searchFields: [],
  ordering: [],
  fieldsets: null,
  readonlyFields: [],
});

/**
 * Extended presentation for user accounts.
 *
 * Expects the model to carry the usual account fields: username, password,
 * names, email, the active/staff/superuser flags, last_login and
 * date_joined.
 */
export const userAdminPresentation: AdminPresentation = Object.freeze({
  listDisplay: ["username", "email", "first_name", "last_name", "is_staff"],
  listFilter: ["is_staff", "is_superuser", "is_active"],
  searchFields: ["username", "first_name", "last_name", "email"],
  ordering: ["username"],
  fieldsets: [
    { title: null, fields: ["username", "password"] },
    { title: "Personal info", fields: ["first_name", "last_name", "email"] },
    {
      title: "Permissions",
      fields: ["is_active", "is_staff", "is_superuser"],
    },
    { title: "Important dates", fields: ["last_login", "date_joined"] },
  ],
  readonlyFields: ["last_login", "date_joined"],
});

/**
 * Fill the gaps of a partial presentation from the default one.
 */
export function resolvePresentation(
  partial: Partial<AdminPresentation> = {},
): AdminPresentation {
  return Object.freeze({ ...defaultPresentation, ...partial });
}
