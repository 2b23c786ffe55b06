import path from "path";
import { DEFAULT_DB_PATH } from "./db";
import type { DayString } from "./dates";
import {
  validateBooleanFlag,
  validateDateString,
  validatePropertyId,
  validateRequiredString,
  type ValidationError,
} from "./security";

export const DEFAULT_START_DAY: DayString = "2023-01-01";
export const DEFAULT_LOG_FILE = path.join(".analytics-sync", "sync.log");

export interface SyncConfig {
  /** Numeric GA4 property ID, e.g. "123456789" */
  propertyId: string;
  /** Path to the OAuth client secret JSON downloaded from Google Cloud */
  clientSecretsFile: string;
  /** Where the authorized user token is cached between runs */
  tokenPath: string;
  /** SQLite file holding sessions_from_analytics */
  databasePath: string;
  /** File that gets one line appended per completed run */
  logFile: string;
  /** Abort the loop on the first failed insert instead of moving on */
  stopOnStoreError: boolean;
  /** First day to sync when the table is empty */
  defaultStartDay: DayString;
}

function parseFlag(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  return normalized === "true" || normalized === "1";
}

/**
 * Read the sync configuration from environment variables.
 *
 * GA_PROPERTY_ID, CLIENT_SECRETS_FILE and TOKEN_PATH are required.
 * Everything else has a default.
 */
export function getSyncConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const errors = [
    validatePropertyId(env.GA_PROPERTY_ID),
    validateRequiredString("CLIENT_SECRETS_FILE", env.CLIENT_SECRETS_FILE),
    validateRequiredString("TOKEN_PATH", env.TOKEN_PATH),
    validateBooleanFlag("SYNC_STOP_ON_STORE_ERROR", env.SYNC_STOP_ON_STORE_ERROR),
    env.SYNC_DEFAULT_START
      ? validateDateString("SYNC_DEFAULT_START", env.SYNC_DEFAULT_START)
      : null,
  ].filter((error): error is ValidationError => error !== null);

  if (errors.length > 0) {
    throw new Error(
      `Invalid configuration:\n${errors.map((e) => `  - ${e.message}`).join("\n")}`
    );
  }

  return {
    propertyId: (env.GA_PROPERTY_ID ?? "").trim(),
    clientSecretsFile: env.CLIENT_SECRETS_FILE ?? "",
    tokenPath: env.TOKEN_PATH ?? "",
    databasePath: env.DATABASE_PATH || DEFAULT_DB_PATH,
    logFile: env.SYNC_LOG_FILE || DEFAULT_LOG_FILE,
    stopOnStoreError: parseFlag(env.SYNC_STOP_ON_STORE_ERROR),
    defaultStartDay: env.SYNC_DEFAULT_START || DEFAULT_START_DAY,
  };
}
