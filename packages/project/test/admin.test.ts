import {
  defaultPresentation,
  DISPLAY_FIELD,
  userAdminPresentation,
} from "@tracker/admin";
import { describe, expect, it } from "vitest";
import { createAdminSite } from "../src/users/admin.ts";
import { User, UserSettings } from "../src/users/models.ts";

const site = createAdminSite();

const ada = {
  id: 1,
  username: "ada",
  password: "test-secret",
  email: "ada@example.com",
  first_name: "Ada",
  last_name: "Lovelace",
  is_active: true,
  is_staff: true,
  is_superuser: false,
  last_login: null,
  date_joined: "2024-01-15T09:30:00Z",
};

describe("users admin", () => {
  it("should register User and UserSettings in order", () => {
    expect(site.entries().map((entry) => entry.model)).toEqual([
      User,
      UserSettings,
    ]);
    expect(site.isRegistered(User)).toBe(true);
    expect(site.isRegistered(UserSettings)).toBe(true);
  });

  it("should present User with the extended presentation", () => {
    expect(site.presentationFor("User")).toEqual(userAdminPresentation);
  });

  it("should present UserSettings with the default presentation", () => {
    expect(site.presentationFor("UserSettings")).toEqual(defaultPresentation);
    expect(site.presentationFor("UserSettings").listDisplay).toEqual([
      DISPLAY_FIELD,
    ]);
  });

  it("should build a user list row", () => {
    expect(site.listRow("User", ada)).toEqual({
      pk: 1,
      values: ["ada", "ada@example.com", "Ada", "Lovelace", true],
    });
  });

  it("should show settings by their default display string", () => {
    const row = site.listRow("UserSettings", {
      id: 5,
      user_id: 1,
      timezone: "Europe/London",
      week_start: 1,
      theme: "dark",
      email_notifications: false,
    });

    expect(row).toEqual({ pk: 5, values: ["UserSettings object (5)"] });
  });

  it("should search users by name and order them by username", () => {
    const grace = {
      ...ada,
      id: 2,
      username: "grace",
      email: "grace@example.com",
      first_name: "Grace",
      last_name: "Hopper",
    };
    const list = site.changelist("User", [grace, ada], { query: "a" });

    expect(list.rows.map((row) => row.pk)).toEqual([1, 2]);
    expect(site.changelist("User", [grace, ada], { query: "hopper" }).rows)
      .toHaveLength(1);
  });
});
