export {
  validateRequiredString,
  validatePropertyId,
  validateBooleanFlag,
  validateDateString,
  type ValidationError,
} from "./validation";

import crypto from "crypto";

/**
 * Generate a cryptographically secure unique ID.
 * Uses crypto.randomUUID() which produces standard v4 UUIDs.
 */
export function generateSecureId(): string {
  return crypto.randomUUID();
}

/**
 * Sanitize an error message before logging or storing it.
 *
 * Strips potential secrets from error messages:
 * - Google OAuth access tokens (ya29.*), refresh tokens (1//*) and
 *   authorization codes (4/*)
 * - OAuth client secrets (GOCSPX-*)
 * - Bearer tokens
 * - Long hex strings that might be keys
 *
 * Truncates to a reasonable length.
 */
const SECRET_PATTERNS = [
  // Bearer tokens (including base64 chars +, /, =)
  /Bearer\s+[a-zA-Z0-9._\-+/=]+/gi,
  // Google access tokens
  /\bya29\.[a-zA-Z0-9._-]+/g,
  // Google refresh tokens
  /\b1\/\/[a-zA-Z0-9._-]{10,}/g,
  // Google authorization codes
  /\b4\/[a-zA-Z0-9._-]{20,}/g,
  // OAuth client secrets
  /\bGOCSPX-[a-zA-Z0-9_-]+/g,
  // Generic API keys (long alphanumeric strings after common key-like prefixes)
  /\b((?:api|key|token|secret|password|auth)[_-]?[a-zA-Z0-9]{20,})\b/gi,
  // Long hex strings (potential keys, 32+ chars)
  /\b[0-9a-f]{32,}\b/gi,
];

const MAX_ERROR_LENGTH = 500;

export function sanitizeErrorMessage(message: string): string {
  let sanitized = message;

  for (const pattern of SECRET_PATTERNS) {
    sanitized = sanitized.replace(pattern, "[REDACTED]");
  }

  if (sanitized.length > MAX_ERROR_LENGTH) {
    sanitized = sanitized.slice(0, MAX_ERROR_LENGTH) + "... (truncated)";
  }

  return sanitized;
}

/**
 * Turn anything thrown into a loggable, secret-free message.
 */
export function describeError(error: unknown, fallback = "Unknown error"): string {
  const raw = error instanceof Error ? error.message : typeof error === "string" ? error : fallback;
  return sanitizeErrorMessage(raw || fallback);
}
