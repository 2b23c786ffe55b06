import type { DayString } from "../../lib/dates";
import type { AccessTokenProvider, DailySessionsFetcher } from "../types";
import {
  GA_DATA_API_BASE,
  GOOGLE_ANALYTICS_NAME,
  SESSIONS_METRIC,
  propertyResource,
} from "./config";

// ─── Data API types ─────────────────────────────────────────────────────────

interface RunReportRequest {
  metrics: Array<{ name: string }>;
  dateRanges: Array<{ startDate: string; endDate: string }>;
}

interface MetricValue {
  value?: string;
}

interface ReportRow {
  metricValues?: MetricValue[];
}

interface RunReportResponse {
  rows?: ReportRow[];
  rowCount?: number;
}

// ─── API helpers ─────────────────────────────────────────────────────────────

async function runReport(
  propertyId: string,
  body: RunReportRequest,
  accessToken: string
): Promise<RunReportResponse> {
  const url = `${GA_DATA_API_BASE}/${propertyResource(propertyId)}:runReport`;

  const res = await fetch(url, {
    method: "POST",
    headers: {
      Accept: "application/json",
      "Content-Type": "application/json",
      Authorization: `Bearer ${accessToken}`,
    },
    body: JSON.stringify(body),
  });

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new Error(
      `${GOOGLE_ANALYTICS_NAME} API error ${res.status}: ${text.slice(0, 200)}`
    );
  }

  return res.json() as Promise<RunReportResponse>;
}

/**
 * Pull the session count out of a single-metric report.
 * No rows means no sessions were recorded for the range.
 */
export function parseSessionCount(response: RunReportResponse): number {
  const raw = response.rows?.[0]?.metricValues?.[0]?.value;
  if (raw === undefined) return 0;

  const sessions = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(sessions)) {
    throw new Error(`Unexpected ${SESSIONS_METRIC} value in report: "${raw}"`);
  }
  return sessions;
}

// ─── Data fetching ───────────────────────────────────────────────────────────

/**
 * Fetch the session count for one day. One request per call; the start and
 * end of the date range are the same day.
 */
export async function fetchSessionsForDay(
  propertyId: string,
  day: DayString,
  tokens: AccessTokenProvider
): Promise<number> {
  const accessToken = await tokens.getAccessToken();
  const response = await runReport(
    propertyId,
    {
      metrics: [{ name: SESSIONS_METRIC }],
      dateRanges: [{ startDate: day, endDate: day }],
    },
    accessToken
  );
  return parseSessionCount(response);
}

export function createSessionsFetcher(options: {
  propertyId: string;
  tokens: AccessTokenProvider;
}): DailySessionsFetcher {
  const { propertyId, tokens } = options;
  return {
    fetchDay: (day) => fetchSessionsForDay(propertyId, day, tokens),
  };
}
