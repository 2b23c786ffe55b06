import { sqliteTable, text, integer, uniqueIndex, index } from "drizzle-orm/sqlite-core";

// ─── Core Tables ────────────────────────────────────────────────────────────

/**
 * One row per synced calendar day (UTC). Rows are append-only: the sync job
 * inserts them and never updates or deletes them.
 */
export const sessionsFromAnalytics = sqliteTable(
  "sessions_from_analytics",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessions: integer("sessions").notNull(),
    startEpoch: integer("start_epoch").notNull(), // inclusive, UTC seconds
    endEpoch: integer("end_epoch").notNull(), // inclusive, next day start - 1
  },
  (table) => [
    uniqueIndex("idx_sessions_start_epoch").on(table.startEpoch),
    index("idx_sessions_end_epoch").on(table.endEpoch),
  ]
);

/**
 * Sync runs track when the job ran and how far it got.
 */
export const syncRuns = sqliteTable("sync_runs", {
  id: text("id").primaryKey(), // UUID
  status: text("status", { enum: ["success", "error", "running"] }).notNull(),
  startedAt: text("started_at").notNull(),
  completedAt: text("completed_at"),
  error: text("error"),
  daysAttempted: integer("days_attempted").notNull().default(0),
  daysStored: integer("days_stored").notNull().default(0),
  heartbeatAt: text("heartbeat_at"), // bumped after every synced day
});

// ─── Type Exports ───────────────────────────────────────────────────────────

export type SyncRun = typeof syncRuns.$inferSelect;
