import fs from "fs";
import path from "path";

/**
 * Format the line written once per run, e.g.
 * "Script executed at 2024-01-07T09:00:00.000Z".
 */
export function formatRunLogLine(at: Date): string {
  return `Script executed at ${at.toISOString()}\n`;
}

/**
 * Append the run line to `logFile`, creating the file and its directory if
 * needed. Existing content is never truncated.
 */
export function appendRunLog(logFile: string, at: Date, fsImpl: typeof fs = fs): void {
  const dir = path.dirname(logFile);
  if (!fsImpl.existsSync(dir)) {
    fsImpl.mkdirSync(dir, { recursive: true });
  }
  fsImpl.appendFileSync(logFile, formatRunLogLine(at), "utf8");
}
