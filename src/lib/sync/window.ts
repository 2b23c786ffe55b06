import { desc } from "drizzle-orm";
import type { SyncDb } from "../db";
import { sessionsFromAnalytics } from "../db/schema";
import { DEFAULT_START_DAY } from "../config";
import { eachDay, epochToUtcDay, nextDay, previousDay, toUtcDay, type DayString } from "../dates";
import { describeError } from "../security";

/**
 * Result of looking up the newest stored day. A failed read is reported as
 * such rather than folded into "empty", which would restart the sync from
 * the default day and duplicate everything already stored.
 */
export type LastStoredDay =
  | { status: "found"; day: DayString; endEpoch: number }
  | { status: "empty" }
  | { status: "error"; error: string };

export interface SyncWindow {
  /** First day to sync (inclusive) */
  startDay: DayString;
  /** Last day to sync (inclusive), always yesterday in UTC */
  endDay: DayString;
  /** Every day in the window, in order. Empty when startDay > endDay. */
  days: DayString[];
}

export function getLastStoredDay(db: SyncDb): LastStoredDay {
  try {
    const row = db
      .select({ endEpoch: sessionsFromAnalytics.endEpoch })
      .from(sessionsFromAnalytics)
      .orderBy(desc(sessionsFromAnalytics.endEpoch))
      .limit(1)
      .get();

    if (!row) return { status: "empty" };
    return { status: "found", day: epochToUtcDay(row.endEpoch), endEpoch: row.endEpoch };
  } catch (error) {
    return { status: "error", error: describeError(error) };
  }
}

/**
 * Compute the days still missing from the table.
 *
 * Starts the day after the last stored day (or at `defaultStartDay` for an
 * empty table) and ends yesterday, so today's partial count is never stored.
 */
export function resolveSyncWindow(
  lastStored: Exclude<LastStoredDay, { status: "error" }>,
  options: { now: Date; defaultStartDay?: DayString }
): SyncWindow {
  const startDay =
    lastStored.status === "found"
      ? nextDay(lastStored.day)
      : options.defaultStartDay ?? DEFAULT_START_DAY;
  const endDay = previousDay(toUtcDay(options.now));

  return { startDay, endDay, days: eachDay(startDay, endDay) };
}
