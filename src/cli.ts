import fs from "fs";
import { getSyncConfig, type SyncConfig } from "./lib/config";
import { openDb, type DbHandle } from "./lib/db";
import { appendRunLog } from "./lib/run-log";
import { describeError } from "./lib/security";
import { runSessionSync, type SessionSyncResult } from "./lib/sync/engine";
import { createCredentialProvider } from "./integrations/google-analytics/auth";
import { createSessionsFetcher } from "./integrations/google-analytics/fetcher";
import type { AccessTokenProvider, DailySessionsFetcher } from "./integrations/types";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  log?: (line: string) => void;
  logError?: (line: string) => void;
  now?: () => Date;
  openDb?: (dbPath: string) => DbHandle;
  createTokens?: (config: SyncConfig, log: (line: string) => void) => AccessTokenProvider;
  createFetcher?: (config: SyncConfig, tokens: AccessTokenProvider) => DailySessionsFetcher;
  fs?: typeof fs;
}

interface ParsedArgs {
  showHelp: boolean;
  stopOnStoreError: boolean;
}

function parseArgs(args: string[]): ParsedArgs {
  let showHelp = false;
  let stopOnStoreError = false;

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      showHelp = true;
      continue;
    }
    if (arg === "--stop-on-store-error") {
      stopOnStoreError = true;
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  return { showHelp, stopOnStoreError };
}

function defaultCreateTokens(config: SyncConfig, log: (line: string) => void) {
  return createCredentialProvider({
    tokenPath: config.tokenPath,
    clientSecretsFile: config.clientSecretsFile,
    log,
  });
}

function defaultCreateFetcher(config: SyncConfig, tokens: AccessTokenProvider) {
  return createSessionsFetcher({ propertyId: config.propertyId, tokens });
}

/**
 * Run one sync. Returns null when only the usage was printed.
 * Configuration errors throw before anything is opened.
 */
export async function runCli(
  args: string[],
  deps: CliDeps = {}
): Promise<SessionSyncResult | null> {
  const log = deps.log ?? console.log;
  const now = deps.now ?? (() => new Date());
  const open = deps.openDb ?? openDb;
  const createTokens = deps.createTokens ?? defaultCreateTokens;
  const createFetcher = deps.createFetcher ?? defaultCreateFetcher;
  const logError = deps.logError ?? console.error;

  // Reported, never thrown
  const writeRunLog = (logFile: string, at: Date) => {
    try {
      appendRunLog(logFile, at, deps.fs ?? fs);
    } catch (error) {
      logError(`[Run log] Could not append to ${logFile}: ${describeError(error)}`);
    }
  };

  const { showHelp, stopOnStoreError } = parseArgs(args);
  if (showHelp) {
    log("Usage: analytics-session-sync [--stop-on-store-error]");
    log("");
    log("Copies daily Google Analytics session counts into sessions_from_analytics,");
    log("from the day after the last stored day through yesterday (UTC).");
    log("");
    log("Options:");
    log("  --stop-on-store-error   Stop at the first day that fails to store");
    log("  --help, -h              Show this help message");
    log("");
    log("Environment:");
    log("  GA_PROPERTY_ID             Numeric GA4 property ID (required)");
    log("  CLIENT_SECRETS_FILE        OAuth client secret JSON (required)");
    log("  TOKEN_PATH                 Cached authorized user token (required)");
    log("  DATABASE_PATH              SQLite file (default: .analytics-sync/data.db)");
    log("  SYNC_LOG_FILE              Run log (default: .analytics-sync/sync.log)");
    log("  SYNC_STOP_ON_STORE_ERROR   Same as --stop-on-store-error");
    log("  SYNC_DEFAULT_START         First day for an empty table (default: 2023-01-01)");
    return null;
  }

  const config = getSyncConfig(deps.env ?? process.env);
  const tokens = createTokens(config, log);
  const fetcher = createFetcher(config, tokens);

  const handle = open(config.databasePath);
  try {
    return await runSessionSync(handle.db, {
      fetcher,
      now,
      defaultStartDay: config.defaultStartDay,
      stopOnStoreError: stopOnStoreError || config.stopOnStoreError,
      log,
    });
  } finally {
    try {
      handle.close();
    } finally {
      writeRunLog(config.logFile, now());
    }
  }
}
