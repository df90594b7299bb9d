import { defineModel } from "@tracker/admin";
import { t } from "@tracker/core";

export const User = defineModel({
  name: "User",
  schema: t.Object({
    id: t.Integer({ minimum: 1 }),
    username: t.String({ minLength: 1, maxLength: 150 }),
    password: t.String(),
    email: t.String({ format: "email" }),
    first_name: t.String({ maxLength: 150 }),
    last_name: t.String({ maxLength: 150 }),
    is_active: t.Boolean(),
    is_staff: t.Boolean(),
    is_superuser: t.Boolean(),
    last_login: t.Union([t.String({ format: "date-time" }), t.Null()]),
    date_joined: t.String({ format: "date-time" }),
  }),
  display: (user) => user.username,
});

export const UserSettings = defineModel({
  name: "UserSettings",
  label: "user settings",
  schema: t.Object({
    id: t.Integer({ minimum: 1 }),
    user_id: t.Integer({ minimum: 1 }),
    timezone: t.String({ minLength: 1 }),
    /** 0 = Sunday */
    week_start: t.Integer({ minimum: 0, maximum: 6 }),
    theme: t.Union([t.Literal("light"), t.Literal("dark")]),
    email_notifications: t.Boolean(),
  }),
});
