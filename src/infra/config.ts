import type { Decimal } from "decimal.js";
import type { BackoffStrategy } from "../application/retry-policy.js";
import { isNegativeAmount, parseDecimal } from "../domain/money.js";
import { AppError } from "./app-error.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

function parseDecimalEnv(name: string, defaultValue: string): Decimal {
  const raw = process.env[name] ?? defaultValue;
  const parsed = parseDecimal(raw);
  if (!parsed || isNegativeAmount(parsed)) {
    throw invalidConfig(name, "must be a non-negative decimal such as 100.00");
  }
  return parsed;
}

export const DEFAULT_API_KEY = "dev_dispute_key";

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  logLevel: LogLevel;
  timeBarredDays: number;
  autoResolveAmount: Decimal;
  allowRefileAfterTerminal: boolean;
  storeBackend: "memory" | "postgres";
  storeMaxAttempts: number;
  storeRetryDelayMs: number;
  storeRetryBackoff: BackoffStrategy;
  caseListDefaultLimit: number;
  caseListMaxLimit: number;
  metricsEnabled: boolean;
  postgresUrl?: string;
  seedFile?: string;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("DSP_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("DSP_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const logLevel = parseEnumEnv("DSP_LOG_LEVEL", LOG_LEVELS, "info");
  const timeBarredDays = parseIntegerEnv("DSP_TIME_BARRED_DAYS", 600, 1, 3650);
  const autoResolveAmount = parseDecimalEnv("DSP_AUTO_RESOLVE_AMOUNT", "100.00");
  const allowRefileAfterTerminal = parseBooleanEnv("DSP_ALLOW_REFILE_AFTER_TERMINAL", false);
  const storeBackend = parseEnumEnv("DSP_STORE_BACKEND", ["memory", "postgres"] as const, "memory");
  const storeMaxAttempts = parseIntegerEnv("DSP_STORE_MAX_ATTEMPTS", 3, 1, 10);
  const storeRetryDelayMs = parseIntegerEnv("DSP_STORE_RETRY_DELAY_MS", 500, 0, 60000);
  const storeRetryBackoff = parseEnumEnv(
    "DSP_STORE_RETRY_BACKOFF",
    ["fixed", "exponential"] as const,
    "exponential",
  );
  const caseListDefaultLimit = parseIntegerEnv("DSP_CASE_LIST_DEFAULT_LIMIT", 50, 1, 1000);
  const caseListMaxLimit = parseIntegerEnv("DSP_CASE_LIST_MAX_LIMIT", 200, 1, 5000);
  const metricsEnabled = parseBooleanEnv("DSP_METRICS_ENABLED", true);
  const postgresUrl = parseOptionalStringEnv("DSP_POSTGRES_URL", 12);
  const seedFile = parseOptionalStringEnv("DSP_SEED_FILE", 1);

  if (process.env.NODE_ENV === "production" && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      configuredApiKeys ? "DSP_API_KEYS" : "DSP_API_KEY",
      "must not include default key value in production",
    );
  }
  if (caseListDefaultLimit > caseListMaxLimit) {
    throw invalidConfig("DSP_CASE_LIST_DEFAULT_LIMIT", "must be lower or equal to DSP_CASE_LIST_MAX_LIMIT");
  }
  if (storeBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("DSP_POSTGRES_URL", "is required when DSP_STORE_BACKEND is postgres");
  }

  return {
    host,
    port,
    apiKey,
    apiKeys,
    logLevel,
    timeBarredDays,
    autoResolveAmount,
    allowRefileAfterTerminal,
    storeBackend,
    storeMaxAttempts,
    storeRetryDelayMs,
    storeRetryBackoff,
    caseListDefaultLimit,
    caseListMaxLimit,
    metricsEnabled,
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(seedFile ? { seedFile } : {}),
  };
}
