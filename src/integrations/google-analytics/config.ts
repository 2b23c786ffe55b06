export const GOOGLE_ANALYTICS_NAME = "Google Analytics";

export const GA_DATA_API_BASE = "https://analyticsdata.googleapis.com/v1beta";

/** Read-only access is all the report query needs. */
export const GA_SCOPES = ["https://www.googleapis.com/auth/analytics.readonly"];

/** The only metric this job syncs. */
export const SESSIONS_METRIC = "sessions";

/**
 * Refresh this long before the recorded expiry, matching the OAuth client's
 * own eager-refresh window so both agree on when a token is stale.
 */
export const TOKEN_EXPIRY_SKEW_MS = 5 * 60 * 1000;

/** Resource name the Data API expects, e.g. "properties/123456789". */
export function propertyResource(propertyId: string): string {
  return `properties/${propertyId}`;
}
