/**
 * Input validation utilities.
 *
 * Keeps validation rules centralized for the environment configuration and
 * the JSON files the sync reads (client secrets, cached token).
 */

import { isDayString } from "../dates";

const MAX_STRING_LENGTH = 1000;
const PROPERTY_ID_PATTERN = /^\d{1,20}$/;
const BOOLEAN_VALUES = ["true", "false", "1", "0"];

export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Validate a required, non-empty string.
 */
export function validateRequiredString(
  field: string,
  value: unknown
): ValidationError | null {
  if (value === undefined || value === null) {
    return { field, message: `${field} is required` };
  }
  if (typeof value !== "string") {
    return { field, message: `${field} must be a string` };
  }
  if (value.trim().length === 0) {
    return { field, message: `${field} cannot be empty` };
  }
  if (value.length > MAX_STRING_LENGTH) {
    return {
      field,
      message: `${field} must be at most ${MAX_STRING_LENGTH} characters`,
    };
  }
  return null;
}

/**
 * Validate a GA4 property ID. Accepts the bare numeric ID only,
 * not the "properties/123" resource name.
 */
export function validatePropertyId(value: unknown): ValidationError | null {
  const missing = validateRequiredString("GA_PROPERTY_ID", value);
  if (missing) return missing;
  if (typeof value !== "string" || !PROPERTY_ID_PATTERN.test(value.trim())) {
    return {
      field: "GA_PROPERTY_ID",
      message: "GA_PROPERTY_ID must be a numeric property ID",
    };
  }
  return null;
}

/**
 * Validate an optional boolean flag given as an environment string.
 */
export function validateBooleanFlag(
  field: string,
  value: string | undefined
): ValidationError | null {
  if (value === undefined || value === "") return null;
  if (!BOOLEAN_VALUES.includes(value.trim().toLowerCase())) {
    return { field, message: `${field} must be one of ${BOOLEAN_VALUES.join(", ")}` };
  }
  return null;
}

/**
 * Validate a date string in YYYY-MM-DD format.
 */
export function validateDateString(
  field: string,
  value: unknown
): ValidationError | null {
  if (typeof value !== "string") {
    return { field, message: `${field} must be a string` };
  }
  if (!isDayString(value)) {
    return { field, message: `${field} must be a valid date in YYYY-MM-DD format` };
  }
  return null;
}
