import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  rubricPath: string;
  jsonBodyLimit: string;
  logWebhookEnabled: boolean;
  logWebhookUrl?: string;
  logWebhookLevel: LogLevel;
  logWebhookRatePerMin: number;
  logWebhookBatchMs: number;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const nodeEnv = source.NODE_ENV ?? "development";
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const logWebhookEnabledRaw = source.LOG_WEBHOOK_ENABLED ?? "false";
  const logWebhookLevelRaw = (source.LOG_WEBHOOK_LEVEL ?? "warn").trim().toLowerCase();
  const logWebhookRatePerMinRaw = source.LOG_WEBHOOK_RATE_PER_MIN ?? "20";
  const logWebhookBatchMsRaw = source.LOG_WEBHOOK_BATCH_MS ?? "2500";
  const logWebhookRatePerMin = Number(logWebhookRatePerMinRaw);
  const logWebhookBatchMs = Number(logWebhookBatchMsRaw);
  const logWebhookEnabled = parseBoolean(logWebhookEnabledRaw);
  const logWebhookUrl = getOptionalTrimmed(source, "LOG_WEBHOOK_URL");

  if (!Number.isInteger(port) || port < 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(logWebhookRatePerMin) || logWebhookRatePerMin < 1) {
    throw new Error(`Invalid LOG_WEBHOOK_RATE_PER_MIN value: ${logWebhookRatePerMinRaw}`);
  }
  if (!Number.isFinite(logWebhookBatchMs) || logWebhookBatchMs < 250) {
    throw new Error(`Invalid LOG_WEBHOOK_BATCH_MS value: ${logWebhookBatchMsRaw}`);
  }
  if (logWebhookEnabled && !logWebhookUrl) {
    throw new Error("LOG_WEBHOOK_URL is required when LOG_WEBHOOK_ENABLED is true");
  }

  return {
    nodeEnv,
    port,
    logLevel: parseLogLevel("LOG_LEVEL", logLevelRaw),
    rubricPath: path.resolve(
      process.cwd(),
      getOptionalTrimmed(source, "RUBRIC_PATH") ?? path.join("data", "rubric.json"),
    ),
    jsonBodyLimit: getOptionalTrimmed(source, "JSON_BODY_LIMIT") ?? "100kb",
    logWebhookEnabled,
    logWebhookUrl,
    logWebhookLevel: parseLogLevel("LOG_WEBHOOK_LEVEL", logWebhookLevelRaw),
    logWebhookRatePerMin,
    logWebhookBatchMs,
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(name: string, value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid ${name} value: ${value}`);
}
