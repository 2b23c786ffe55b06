import { addDays, eachDayOfInterval, format, isValid, parseISO, subDays } from "date-fns";

/** Day strings are calendar days in YYYY-MM-DD form, always read as UTC. */
export type DayString = string;

export const SECONDS_PER_DAY = 86_400;

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_FORMAT = "yyyy-MM-dd";

/**
 * Check that a string is a real calendar day in YYYY-MM-DD format.
 */
export function isDayString(value: string): value is DayString {
  if (!DAY_PATTERN.test(value)) return false;
  const parsed = parseISO(value);
  // parseISO rolls 2023-02-30 over, so compare the round trip
  return isValid(parsed) && format(parsed, DAY_FORMAT) === value;
}

/**
 * The UTC calendar day a Date falls on.
 */
export function toUtcDay(date: Date): DayString {
  return date.toISOString().slice(0, 10);
}

/**
 * The UTC calendar day containing a Unix timestamp (seconds).
 */
export function epochToUtcDay(epoch: number): DayString {
  return toUtcDay(new Date(epoch * 1000));
}

/**
 * Unix timestamp (seconds) of 00:00:00 UTC on the given day.
 */
export function dayStartEpoch(day: DayString): number {
  return Date.parse(`${day}T00:00:00.000Z`) / 1000;
}

/**
 * Unix timestamp (seconds) of 23:59:59 UTC on the given day.
 */
export function dayEndEpoch(day: DayString): number {
  return dayStartEpoch(day) + SECONDS_PER_DAY - 1;
}

// Calendar arithmetic runs on local-midnight Dates built from the day string
// and is formatted back the same way, so the offset never leaks into the result.

export function nextDay(day: DayString): DayString {
  return format(addDays(parseISO(day), 1), DAY_FORMAT);
}

export function previousDay(day: DayString): DayString {
  return format(subDays(parseISO(day), 1), DAY_FORMAT);
}

/**
 * Every day from `start` through `end`, inclusive. Empty when start > end.
 */
export function eachDay(start: DayString, end: DayString): DayString[] {
  if (start > end) return [];
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map(
    (date) => format(date, DAY_FORMAT)
  );
}
