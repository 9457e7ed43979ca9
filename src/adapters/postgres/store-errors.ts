import { isDecimalString } from "../../domain/money.js";
import { StoreError } from "../../ports/store-error.js";

const THROTTLE_CODES = new Set(["53300", "40001", "40P01", "55P03", "57014"]);
const VALIDATION_CODES = new Set(["23502", "23514"]);
const CONNECTIVITY_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "ECONNRESET", "EPIPE", "57P01"]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps driver and SQLSTATE failures onto StoreError kinds. Anything that is not
 * recognised is returned unchanged.
 */
export function classifyPostgresError(error: unknown): unknown {
  if (error instanceof StoreError) {
    return error;
  }
  const code = errorCode(error);
  if (!code) {
    return error;
  }
  const message = errorMessage(error);
  if (THROTTLE_CODES.has(code)) {
    return new StoreError("throttled", message);
  }
  if (code === "23505") {
    return new StoreError("conditional_check_failed", message);
  }
  if (VALIDATION_CODES.has(code) || code.startsWith("22")) {
    return new StoreError("validation", message);
  }
  if (CONNECTIVITY_CODES.has(code) || code.startsWith("08")) {
    return new StoreError("connectivity", message);
  }
  return error;
}

export function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function mapOptionalTimestamp(value: unknown): string | null {
  return value === null || value === undefined ? null : mapTimestamp(value);
}

/** NUMERIC columns arrive as strings from pg. */
export function mapDecimal(value: unknown, field: string): string {
  const text = typeof value === "number" ? String(value) : value;
  if (typeof text !== "string" || !isDecimalString(text)) {
    throw new StoreError("validation", `Unable to map numeric field '${field}'.`);
  }
  return text;
}

export function mapOptionalDecimal(value: unknown, field: string): string | null {
  return value === null || value === undefined ? null : mapDecimal(value, field);
}
