import { path, type RouteDefinition } from "@tracker/core";
import { courseDetail, courseList } from "./views.ts";

export const coursesUrls: RouteDefinition[] = [
  path("/", courseList, { name: "course_list" }),
  path("/:pk/", courseDetail, { name: "course_detail" }),
];
