import type { Handler } from "@tracker/core";

export const courseList: Handler<Record<never, never>> = () =>
  "List of courses";

export const courseDetail: Handler<{ pk: string }> = ({ params }) =>
  `Details for course with id ${params.pk}`;
