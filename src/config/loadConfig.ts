import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { isLogLevel } from "../observability/types";
import { AppConfig, ConfigOverrides, ExpectedStatusRegistry, OutputDirs } from "./types";

const DEFAULT_EXPECTED_STATUS: ExpectedStatusRegistry = {
  A: ["Active", "Accepted"],
  D: ["Deferred"],
  F: ["Final"],
  P: ["Provisional"],
  R: ["Rejected"],
  S: ["Superseded"],
  W: ["Withdrawn"],
  "": ["Draft", "Active"],
};

const DEFAULT_CONFIG: AppConfig = {
  mainDocUrl: "https://docs.python.org/3/",
  pepUrl: "https://peps.python.org/",
  userAgent: "docs-scraper/1.0",
  ignoreHttpsErrors: false,
  cacheDir: "data/http-cache",
  logLevel: "info",
  expectedStatus: DEFAULT_EXPECTED_STATUS,
  outputDirs: {
    results: "results",
    downloads: "downloads",
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`Config field "${key}" must be a string`);
  }
  return value;
}

function pickNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`Config field "${key}" must be a number`);
  }
  return value;
}

function pickBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`Config field "${key}" must be a boolean`);
  }
  return value;
}

function parseExpectedStatus(value: unknown): ExpectedStatusRegistry | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError('Config field "expectedStatus" must be an object of string arrays');
  }

  const registry: Record<string, readonly string[]> = {};
  for (const [category, statuses] of Object.entries(value)) {
    if (!Array.isArray(statuses) || !statuses.every((status): status is string => typeof status === "string")) {
      throw new ConfigError(`Config field "expectedStatus.${category}" must be an array of strings`);
    }
    registry[category] = [...statuses];
  }
  return registry;
}

export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError("Config file must contain a JSON object");
  }

  const logLevel = pickString(raw, "logLevel");
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigError(`Config field "logLevel" must be one of debug, info, warn, error`);
  }

  let outputDirs: Partial<OutputDirs> | undefined;
  if (raw.outputDirs !== undefined) {
    if (!isRecord(raw.outputDirs)) {
      throw new ConfigError('Config field "outputDirs" must be an object');
    }
    outputDirs = {
      results: pickString(raw.outputDirs, "results"),
      downloads: pickString(raw.outputDirs, "downloads"),
    };
  }

  return {
    mainDocUrl: pickString(raw, "mainDocUrl"),
    pepUrl: pickString(raw, "pepUrl"),
    userAgent: pickString(raw, "userAgent"),
    ignoreHttpsErrors: pickBoolean(raw, "ignoreHttpsErrors"),
    requestTimeoutMs: pickNumber(raw, "requestTimeoutMs"),
    cacheDir: pickString(raw, "cacheDir"),
    logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : undefined,
    logFile: pickString(raw, "logFile"),
    expectedStatus: parseExpectedStatus(raw.expectedStatus),
    outputDirs,
  };
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath} (${error instanceof Error ? error.message : String(error)})`);
  }
  return parseConfigOverrides(parsed);
}

function toOptionalInt(value: string | undefined, fallback: number | undefined): number | undefined {
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

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    mainDocUrl: fileConfig.mainDocUrl ?? DEFAULT_CONFIG.mainDocUrl,
    pepUrl: fileConfig.pepUrl ?? DEFAULT_CONFIG.pepUrl,
    userAgent: fileConfig.userAgent ?? DEFAULT_CONFIG.userAgent,
    ignoreHttpsErrors: fileConfig.ignoreHttpsErrors ?? DEFAULT_CONFIG.ignoreHttpsErrors,
    requestTimeoutMs: fileConfig.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    cacheDir: fileConfig.cacheDir ?? DEFAULT_CONFIG.cacheDir,
    logLevel: fileConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
    logFile: fileConfig.logFile ?? DEFAULT_CONFIG.logFile,
    expectedStatus: fileConfig.expectedStatus ?? DEFAULT_CONFIG.expectedStatus,
    outputDirs: {
      results: fileConfig.outputDirs?.results ?? DEFAULT_CONFIG.outputDirs.results,
      downloads: fileConfig.outputDirs?.downloads ?? DEFAULT_CONFIG.outputDirs.downloads,
    },
  };

  const envLogLevel = env.LOG_LEVEL?.trim().toLowerCase();

  return {
    ...merged,
    mainDocUrl: env.MAIN_DOC_URL ?? merged.mainDocUrl,
    pepUrl: env.PEP_URL ?? merged.pepUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toOptionalInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    cacheDir: env.CACHE_DIR ?? merged.cacheDir,
    logLevel: envLogLevel && isLogLevel(envLogLevel) ? envLogLevel : merged.logLevel,
    logFile: env.LOG_FILE ?? merged.logFile,
    outputDirs: {
      results: env.OUTPUT_RESULTS_DIR ?? merged.outputDirs.results,
      downloads: env.OUTPUT_DOWNLOADS_DIR ?? merged.outputDirs.downloads,
    },
  };
}

export { DEFAULT_CONFIG };
