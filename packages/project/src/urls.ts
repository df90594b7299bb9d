import { include, type RouteDefinition } from "@tracker/core";
import { calendarrUrls } from "./calendarr/urls.ts";
import { coursesUrls } from "./courses/urls.ts";

/**
 * Root route list, in priority order.
 */
export const urlpatterns: RouteDefinition[] = [
  ...include("/", calendarrUrls),
  ...include("/courses", coursesUrls),
];
