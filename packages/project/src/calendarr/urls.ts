import { path, type RouteDefinition } from "@tracker/core";
import { calendarrView, eventDetail } from "./views.ts";

export const calendarrUrls: RouteDefinition[] = [
  path("/", calendarrView, { name: "calendarr_view" }),
  path("/event/:eventId/", eventDetail, {
    name: "event_detail",
    params: { eventId: "int" },
  }),
];
