import {
  AdminSite,
  type AdminRegistration,
  userAdminPresentation,
} from "@tracker/admin";
import { User, UserSettings } from "./models.ts";

export const usersAdmin: AdminRegistration[] = [
  { model: User, presentation: userAdminPresentation },
  { model: UserSettings },
];

export function createAdminSite(): AdminSite {
  return new AdminSite(usersAdmin);
}
