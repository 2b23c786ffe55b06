import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";
import path from "path";
import fs from "fs";

export const DEFAULT_DB_PATH = path.join(".analytics-sync", "data.db");

export type SyncDb = BetterSQLite3Database<typeof schema>;

export interface DbHandle {
  db: SyncDb;
  sqlite: Database.Database;
  close: () => void;
}

function createConnection(dbPath: string) {
  // For non-memory databases, ensure directory exists
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");

  return sqlite;
}

/**
 * Open the database at `dbPath` and make sure the schema exists.
 * The caller owns the handle and must close it when the run ends.
 */
export function openDb(dbPath: string = DEFAULT_DB_PATH): DbHandle {
  const sqlite = createConnection(dbPath);
  initializeDatabase(sqlite);
  const db = drizzle(sqlite, { schema });
  return {
    db,
    sqlite,
    close: () => {
      if (sqlite.open) sqlite.close();
    },
  };
}

/**
 * Create a fresh in-memory database (useful for testing).
 */
export function createTestDb(): DbHandle {
  return openDb(":memory:");
}

/**
 * Initialize the database schema.
 * Creates all tables if they don't exist.
 */
function initializeDatabase(sqlite: Database.Database) {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS sessions_from_analytics (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sessions INTEGER NOT NULL,
      start_epoch INTEGER NOT NULL,
      end_epoch INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sync_runs (
      id TEXT PRIMARY KEY,
      status TEXT NOT NULL CHECK(status IN ('success', 'error', 'running')),
      started_at TEXT NOT NULL,
      completed_at TEXT,
      error TEXT,
      days_attempted INTEGER NOT NULL DEFAULT 0,
      days_stored INTEGER NOT NULL DEFAULT 0,
      heartbeat_at TEXT
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_start_epoch ON sessions_from_analytics(start_epoch);
    CREATE INDEX IF NOT EXISTS idx_sessions_end_epoch ON sessions_from_analytics(end_epoch);
    CREATE INDEX IF NOT EXISTS idx_sync_runs_status ON sync_runs(status, started_at);
  `);

  // Databases created before runs kept a heartbeat
  const syncRunColumns = sqlite
    .prepare("SELECT name FROM pragma_table_info('sync_runs')")
    .pluck()
    .all();
  if (!syncRunColumns.includes("heartbeat_at")) {
    sqlite.exec("ALTER TABLE sync_runs ADD COLUMN heartbeat_at TEXT");
  }
}
