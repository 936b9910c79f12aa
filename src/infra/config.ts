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

export const RISK_PROVIDER_BACKENDS = ["fixed", "stub", "http"] as const;

export type RiskProviderBackend = (typeof RISK_PROVIDER_BACKENDS)[number];

export const DEFAULT_API_KEY = "dev_decision_key";

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  logLevel: LogLevel;
  metricsEnabled: boolean;
  riskProvider: RiskProviderBackend;
  riskProviderUrl?: string;
  riskTimeoutMs: number;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("CDE_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("CDE_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const logLevel = parseEnumEnv("CDE_LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("CDE_METRICS_ENABLED", true);
  const riskProvider = parseEnumEnv("CDE_RISK_PROVIDER", RISK_PROVIDER_BACKENDS, "fixed");
  const riskProviderUrl = parseOptionalStringEnv("CDE_RISK_PROVIDER_URL", 8);
  const riskTimeoutMs = parseIntegerEnv("CDE_RISK_TIMEOUT_MS", 250, 10, 30000);

  if (process.env.NODE_ENV === "production" && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      configuredApiKeys ? "CDE_API_KEYS" : "CDE_API_KEY",
      "must not include default key value in production",
    );
  }
  if (riskProvider === "http" && !riskProviderUrl) {
    throw invalidConfig("CDE_RISK_PROVIDER_URL", "is required when CDE_RISK_PROVIDER is http");
  }

  return {
    host,
    port,
    apiKey,
    apiKeys,
    logLevel,
    metricsEnabled,
    riskProvider,
    riskTimeoutMs,
    ...(riskProviderUrl ? { riskProviderUrl } : {}),
  };
}
