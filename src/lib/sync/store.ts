import type { SyncDb } from "../db";
import { sessionsFromAnalytics } from "../db/schema";
import { dayEndEpoch, dayStartEpoch, type DayString } from "../dates";
import { describeError } from "../security";
import type { SessionRecord } from "../../integrations/types";

export type StoreOutcome =
  | { status: "stored"; record: SessionRecord }
  | { status: "no_data" }
  | { status: "error"; error: string };

/**
 * Build the row for one UTC day. endEpoch is always startEpoch + 86399.
 */
export function buildSessionRecord(day: DayString, sessions: number): SessionRecord {
  return {
    sessions,
    startEpoch: dayStartEpoch(day),
    endEpoch: dayEndEpoch(day),
  };
}

/**
 * Insert one day's row.
 *
 * Never throws: an insert that fails or returns nothing is logged and
 * reported through the outcome, and the caller decides whether to go on.
 */
export function storeSessionRecord(
  db: SyncDb,
  record: SessionRecord,
  log: (line: string) => void = console.log
): StoreOutcome {
  try {
    const [row] = db
      .insert(sessionsFromAnalytics)
      .values(record)
      .returning()
      .all();

    if (!row) {
      log(
        `Error storing data for start_epoch: ${record.startEpoch}: No data returned in response.`
      );
      return { status: "no_data" };
    }

    log(`Successfully stored data for start_epoch: ${record.startEpoch}`);
    return {
      status: "stored",
      record: {
        sessions: row.sessions,
        startEpoch: row.startEpoch,
        endEpoch: row.endEpoch,
      },
    };
  } catch (error) {
    const message = describeError(error, "Insert failed");
    log(
      `Exception occurred while storing data for start_epoch: ${record.startEpoch}: ${message}`
    );
    return { status: "error", error: message };
  }
}
