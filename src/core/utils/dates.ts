import { CliError } from "../errors.js";

/** A date without time of day: whole days since 1970-01-01. */
export type CalendarDay = number;

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DAY_PREFIX_RE = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Reads the calendar day an ISO-8601 timestamp was written in.
 * `2024-01-04T23:59:59Z` is 2024-01-04 regardless of the local time zone.
 */
export function parseCalendarDay(value: string): CalendarDay {
  const match = ISO_DAY_PREFIX_RE.exec(value.trim());
  if (!match) {
    throw new CliError(`Invalid date: ${value}`);
  }
  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  const parsed = ms / DAY_MS;
  if (!Number.isInteger(parsed) || formatCalendarDay(parsed) !== `${year}-${month}-${day}`) {
    throw new CliError(`Invalid date: ${value}`);
  }
  return parsed;
}

export function parseOptionalCalendarDay(value: string | null | undefined): CalendarDay | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  return parseCalendarDay(value);
}

/** The local calendar day of `now`. */
export function today(now: Date = new Date()): CalendarDay {
  return Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()) / DAY_MS;
}

export function addDays(day: CalendarDay, days: number): CalendarDay {
  return day + days;
}

export function daysBetween(from: CalendarDay, to: CalendarDay): number {
  return to - from;
}

export function formatCalendarDay(day: CalendarDay): string {
  return new Date(day * DAY_MS).toISOString().slice(0, 10);
}
