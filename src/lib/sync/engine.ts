import { desc, eq } from "drizzle-orm";
import type { SyncDb } from "../db";
import { syncRuns, type SyncRun } from "../db/schema";
import type { DayString } from "../dates";
import { describeError, generateSecureId } from "../security";
import type { DailySessionsFetcher } from "../../integrations/types";
import { buildSessionRecord, storeSessionRecord } from "./store";
import { getLastStoredDay, resolveSyncWindow } from "./window";

const RUNNING_SYNC_TTL_MS = 10 * 60 * 1000;

export interface SessionSyncOptions {
  fetcher: DailySessionsFetcher;
  /** Clock used for "yesterday" and the run timestamps */
  now?: () => Date;
  /** First day to sync when the table is empty */
  defaultStartDay?: DayString;
  /**
   * Stop at the first day that could not be stored. Off by default: the run
   * moves on to the next day and the failed day is left as a gap.
   */
  stopOnStoreError?: boolean;
  log?: (line: string) => void;
}

export interface SessionSyncResult {
  success: boolean;
  runId?: string;
  window?: { startDay: DayString; endDay: DayString };
  daysAttempted: number;
  daysStored: number;
  /** Days that were fetched but not stored */
  failedDays: DayString[];
  error?: string;
  startedAt?: string;
  completedAt?: string;
}

/**
 * Refuse to start while another run is in progress. A live run bumps its
 * heartbeat after every day, so a "running" row whose last heartbeat (or
 * start, before the first day) is older than the TTL is left over from a
 * crashed process and is closed out.
 */
function checkForRunningSync(db: SyncDb, nowMs: number, completedAt: string): boolean {
  const runningRun = db
    .select()
    .from(syncRuns)
    .where(eq(syncRuns.status, "running"))
    .orderBy(desc(syncRuns.startedAt))
    .limit(1)
    .get();

  if (!runningRun) return false;

  const lastSeenMs = Date.parse(runningRun.heartbeatAt ?? runningRun.startedAt);
  if (!Number.isNaN(lastSeenMs) && nowMs - lastSeenMs < RUNNING_SYNC_TTL_MS) {
    return true;
  }

  db.update(syncRuns)
    .set({ status: "error", completedAt, error: "Stale running sync detected" })
    .where(eq(syncRuns.id, runningRun.id))
    .run();
  return false;
}

/**
 * Sync every missing day from Google Analytics into sessions_from_analytics.
 *
 * Days are fetched and stored one at a time, oldest first. A fetch failure
 * ends the run. A store failure is logged and the run continues, unless
 * `stopOnStoreError` is set.
 */
export async function runSessionSync(
  db: SyncDb,
  options: SessionSyncOptions
): Promise<SessionSyncResult> {
  const now = options.now ?? (() => new Date());
  const log = options.log ?? console.log;

  const startedAtDate = now();
  const startedAt = startedAtDate.toISOString();

  if (checkForRunningSync(db, startedAtDate.getTime(), startedAt)) {
    log("[Sync] Another sync is already running, skipping this run");
    return {
      success: false,
      daysAttempted: 0,
      daysStored: 0,
      failedDays: [],
      error: "Sync already running",
    };
  }

  const runId = generateSecureId();
  db.insert(syncRuns)
    .values({ id: runId, status: "running", startedAt, heartbeatAt: startedAt })
    .run();

  let daysAttempted = 0;
  let daysStored = 0;
  const failedDays: DayString[] = [];

  const heartbeat = () => {
    db.update(syncRuns)
      .set({ daysAttempted, daysStored, heartbeatAt: now().toISOString() })
      .where(eq(syncRuns.id, runId))
      .run();
  };

  const finish = (
    outcome: { error?: string; window?: SessionSyncResult["window"] }
  ): SessionSyncResult => {
    const completedAt = now().toISOString();
    const success = !outcome.error;

    db.update(syncRuns)
      .set({
        status: success ? "success" : "error",
        completedAt,
        error: outcome.error ?? null,
        daysAttempted,
        daysStored,
        heartbeatAt: completedAt,
      })
      .where(eq(syncRuns.id, runId))
      .run();

    return {
      success,
      runId,
      window: outcome.window,
      daysAttempted,
      daysStored,
      failedDays,
      error: outcome.error,
      startedAt,
      completedAt,
    };
  };

  const lastStored = getLastStoredDay(db);
  if (lastStored.status === "error") {
    const error = `Could not read the last stored day: ${lastStored.error}`;
    log(`[Sync] ${error}`);
    return finish({ error });
  }

  const syncWindow = resolveSyncWindow(lastStored, {
    now: startedAtDate,
    defaultStartDay: options.defaultStartDay,
  });
  const range = { startDay: syncWindow.startDay, endDay: syncWindow.endDay };

  if (syncWindow.days.length === 0) {
    log(`[Sync] Already up to date through ${syncWindow.endDay}`);
    return finish({ window: range });
  }

  log(
    `[Sync] Syncing ${syncWindow.days.length} day(s) from ${syncWindow.startDay} to ${syncWindow.endDay}`
  );

  let currentDay: DayString | undefined;
  try {
    for (const day of syncWindow.days) {
      currentDay = day;
      const sessions = await options.fetcher.fetchDay(day);

      daysAttempted += 1;
      const outcome = storeSessionRecord(db, buildSessionRecord(day, sessions), log);
      if (outcome.status === "stored") {
        daysStored += 1;
      } else {
        failedDays.push(day);
      }
      heartbeat();

      if (outcome.status !== "stored" && options.stopOnStoreError) {
        const error = `Stopped after failing to store ${day}`;
        log(`[Sync] ${error}`);
        return finish({ error, window: range });
      }
    }
  } catch (error) {
    const message = describeError(error);
    const safeError = currentDay
      ? `Error fetching data for ${currentDay}: ${message}`
      : message;
    log(`[Sync] ${safeError}`);
    return finish({ error: safeError, window: range });
  }

  if (failedDays.length > 0) {
    const error = `Failed to store ${failedDays.length} day(s): ${failedDays.join(", ")}`;
    log(`[Sync] Stored ${daysStored} day(s). ${error}`);
    return finish({ error, window: range });
  }

  log(`[Sync] Stored ${daysStored} day(s)`);
  return finish({ window: range });
}

/**
 * The most recent sync run, if any.
 */
export function getLastSyncRun(db: SyncDb): SyncRun | undefined {
  return db
    .select()
    .from(syncRuns)
    .orderBy(desc(syncRuns.startedAt))
    .limit(1)
    .get();
}
