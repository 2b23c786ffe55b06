/**
 * Core types shared by the analytics integration and the sync engine.
 *
 * The engine only talks to these contracts, so a test (or another
 * analytics source) can stand in for Google Analytics.
 */

import type { DayString } from "../lib/dates";

// ─── Records ────────────────────────────────────────────────────────────────

/**
 * One synced day, as written to sessions_from_analytics.
 */
export interface SessionRecord {
  /** Session count reported for the day */
  sessions: number;
  /** 00:00:00 UTC of the day, in Unix seconds */
  startEpoch: number;
  /** 23:59:59 UTC of the day, in Unix seconds (next day start - 1) */
  endEpoch: number;
}

// ─── Contracts ──────────────────────────────────────────────────────────────

export interface AccessTokenProvider {
  /**
   * Return a bearer token that is valid right now.
   * Loads, refreshes or re-authorizes as needed. Throws when none can be had.
   */
  getAccessToken(): Promise<string>;
}

export interface DailySessionsFetcher {
  /**
   * Fetch the session count for one UTC calendar day.
   * Resolves to 0 when the report has no rows for that day.
   * Throws on any API error.
   */
  fetchDay(day: DayString): Promise<number>;
}
