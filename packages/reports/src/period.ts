/**
 * Period parsing. All bounds are whole UTC days.
 */

import { ReportError } from "./types.js";
import type { PeriodInput, ResolvedPeriod } from "./types.js";

const DATE_PATTERN = /^(\d{4})-(\d{2})(?:-(\d{2}))?$/;

interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number | undefined;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** Number of days in a 1-based month. */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseCalendarDate(value: string, field: "start" | "end"): CalendarDate {
  const match = DATE_PATTERN.exec(value.trim());
  if (match === null) {
    throw new ReportError("INVALID_PERIOD", `Invalid '${field}'. Use YYYY-MM or YYYY-MM-DD.`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = match[3] === undefined ? undefined : Number(match[3]);

  if (month < 1 || month > 12 || (day !== undefined && (day < 1 || day > daysInMonth(year, month)))) {
    throw new ReportError("INVALID_PERIOD", `Invalid '${field}'. ${value} is not a calendar date.`);
  }
  return { year, month, day };
}

/** "YYYY-MM" means the first day of that month. */
export function parseStart(value: string): string {
  const { year, month, day } = parseCalendarDate(value, "start");
  return formatDate(year, month, day ?? 1);
}

/** "YYYY-MM" means the last day of that month. */
export function parseEnd(value: string): string {
  const { year, month, day } = parseCalendarDate(value, "end");
  return formatDate(year, month, day ?? daysInMonth(year, month));
}

export function resolvePeriod(input: PeriodInput): ResolvedPeriod {
  const start = input.start === undefined || input.start === "" ? null : parseStart(input.start);
  const end = input.end === undefined || input.end === "" ? null : parseEnd(input.end);

  if (start !== null && end !== null && start > end) {
    throw new ReportError("INVALID_PERIOD", "'start' cannot be after 'end'.");
  }

  return {
    start,
    end,
    from: start === null ? undefined : `${start}T00:00:00.000Z`,
    to: end === null ? undefined : `${end}T23:59:59.999Z`,
  };
}

/** The calendar month containing `now`. */
export function currentMonth(now: Date): PeriodInput {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth() + 1;
  return {
    start: formatDate(year, month, 1),
    end: formatDate(year, month, daysInMonth(year, month)),
  };
}

/** Month bucket of an ISO timestamp. */
export function monthOf(timestamp: string): string {
  return `${timestamp.slice(0, 7)}-01`;
}
