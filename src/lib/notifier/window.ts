import type { ReportingWindow } from "./types";

/**
 * First and last day of the calendar month before `now`, at local midnight.
 * Date's month arithmetic handles the January rollover, and day 0 of the
 * current month is the last day of the previous one (leap years included).
 */
export function reportingWindow(now: Date = new Date()): ReportingWindow {
  const from = new Date(now.getFullYear(), now.getMonth() - 1, 1);
  const to = new Date(now.getFullYear(), now.getMonth(), 0);
  return { from, to };
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

const DISPLAY_FORMAT = new Intl.DateTimeFormat("en-US", {
  month: "long",
  day: "numeric",
  year: "numeric",
});

/** e.g. "February 1, 2024" */
export function formatDisplayDate(date: Date): string {
  return DISPLAY_FORMAT.format(date);
}
