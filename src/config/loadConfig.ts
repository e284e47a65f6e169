import fs from "node:fs";
import path from "node:path";
import { isLogLevel } from "../observability/logger";
import { LogLevel } from "../observability/types";
import { assertSourceName } from "../store/localStore";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  storageRoot: "data",
  windowDays: 7,
  schedule: {
    weekday: 0,
    hour: 9,
    minute: 0,
  },
  hourly: false,
  backoffSeconds: 60,
  logDir: "logs",
  logLevel: "info",
  userAgent: "harvest-ledger/1.0",
  requestTimeoutMs: 30_000,
  downloadTimeoutMs: 60_000,
  ignoreHttpsErrors: false,
  dropQueryKeys: undefined,
  harvesters: [],
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = JSON.parse(raw) as ConfigOverrides;
  return parsed ?? {};
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : fallback;
}

function assertRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Invalid ${name}: ${value} (expected an integer in ${min}..${max})`);
  }
}

export function validateConfig(config: AppConfig): AppConfig {
  assertRange("schedule.weekday", config.schedule.weekday, 0, 6);
  assertRange("schedule.hour", config.schedule.hour, 0, 23);
  assertRange("schedule.minute", config.schedule.minute, 0, 59);
  assertRange("windowDays", config.windowDays, 1, 3650);
  assertRange("backoffSeconds", config.backoffSeconds, 0, 86_400);
  if (!isLogLevel(config.logLevel)) {
    throw new Error(`Invalid logLevel: ${String(config.logLevel)}`);
  }

  const names = new Set<string>();
  for (const definition of config.harvesters) {
    if (names.has(definition.name)) {
      throw new Error(`Duplicate harvester name: ${definition.name}`);
    }
    names.add(definition.name);
    assertSourceName(definition.name);
    if (definition.idBasis !== "raw" && definition.idBasis !== "canonical") {
      throw new Error(`Harvester ${definition.name}: idBasis must be "raw" or "canonical"`);
    }
  }
  return config;
}

export function loadConfig(configPath?: string): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    schedule: {
      ...DEFAULT_CONFIG.schedule,
      ...(fileConfig.schedule ?? {}),
    },
  };

  return validateConfig({
    ...merged,
    storageRoot: process.env.STORAGE_ROOT ?? merged.storageRoot,
    windowDays: toInt(process.env.WINDOW_DAYS, merged.windowDays),
    schedule: {
      weekday: toInt(process.env.SCHEDULE_WEEKDAY, merged.schedule.weekday),
      hour: toInt(process.env.SCHEDULE_HOUR, merged.schedule.hour),
      minute: toInt(process.env.SCHEDULE_MINUTE, merged.schedule.minute),
    },
    hourly: toBool(process.env.HOURLY_MODE, merged.hourly),
    backoffSeconds: toInt(process.env.BACKOFF_SECONDS, merged.backoffSeconds),
    logDir: process.env.LOG_DIR ?? merged.logDir,
    logLevel: toLogLevel(process.env.LOG_LEVEL, merged.logLevel),
    userAgent: process.env.USER_AGENT ?? merged.userAgent,
    requestTimeoutMs: toInt(process.env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(process.env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    ignoreHttpsErrors: toBool(process.env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
  });
}

export { DEFAULT_CONFIG };
