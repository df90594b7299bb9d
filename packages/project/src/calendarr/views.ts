import type { Handler } from "@tracker/core";

export const CALENDARR_HOME = "Welcome to Calendarr";

export const calendarrView: Handler<Record<never, never>> = () =>
  CALENDARR_HOME;

// Every id renders; there is no event store to look ids up in.
export const eventDetail: Handler<{ eventId: bigint }> = ({ params }) =>
  `Details for event with id ${params.eventId}`;
