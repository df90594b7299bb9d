/**
 * The tracker project: calendarr, courses and users.
 *
 * @module
 */

export { createProjectLogger, createTrackerApp } from "./app.ts";
export type { TrackerApp } from "./app.ts";
export { loadConfig } from "./config.ts";
export type { TrackerConfig } from "./config.ts";
export { urlpatterns } from "./urls.ts";
export { calendarrUrls } from "./calendarr/urls.ts";
export { CALENDARR_HOME, calendarrView, eventDetail } from "./calendarr/views.ts";
export { coursesUrls } from "./courses/urls.ts";
export { courseDetail, courseList } from "./courses/views.ts";
export { User, UserSettings } from "./users/models.ts";
export { createAdminSite, usersAdmin } from "./users/admin.ts";
