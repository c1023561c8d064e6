import fs from "node:fs";
import path from "node:path";
import { parseLogLevel } from "../observability/logger";
import { AppConfig, ConfigOverrides } from "./types";

const LETTER_SUFFIXES = Array.from({ length: 26 }, (_, i) => String.fromCharCode(65 + i));

const DEFAULT_CONFIG: AppConfig = {
  listBaseUrl: "https://en.wikipedia.org/wiki/List_of_airline_codes_",
  // "0–9" (en dash, percent-encoded) followed by A..Z
  pageSuffixes: ["0%E2%80%939", ...LETTER_SUFFIXES],
  userAgent: "Mozilla/5.0 (compatible; airline-codes-scraper/1.0; node)",
  ignoreHttpsErrors: false,
  markerColumn: "IATA",
  datasetPath: "airline_codes_all.csv",
  logoDir: "airline_bitmaps",
  logoExtension: "png",
  downloadConcurrency: 12,
  manifestPath: "airline_bitmaps/manifest.jsonl",
  logLevel: "info",
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
  return parseConfigOverrides(JSON.parse(raw), absolutePath);
}

const STRING_FIELDS = [
  "listBaseUrl",
  "userAgent",
  "markerColumn",
  "datasetPath",
  "logoDir",
  "logoExtension",
  "manifestPath",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalidField(field: string, source: string): Error {
  return new Error(`Config file has an invalid ${field}: ${source}`);
}

export function parseConfigOverrides(value: unknown, source: string): ConfigOverrides {
  if (!isRecord(value)) {
    throw new Error(`Config file must contain a JSON object: ${source}`);
  }

  const overrides: ConfigOverrides = {};
  for (const field of STRING_FIELDS) {
    const raw = value[field];
    if (raw === undefined) {
      continue;
    }
    if (typeof raw !== "string") {
      throw invalidField(field, source);
    }
    overrides[field] = raw;
  }

  const { pageSuffixes, ignoreHttpsErrors, downloadConcurrency, logLevel } = value;
  if (pageSuffixes !== undefined) {
    if (!Array.isArray(pageSuffixes) || !pageSuffixes.every((suffix): suffix is string => typeof suffix === "string")) {
      throw invalidField("pageSuffixes", source);
    }
    overrides.pageSuffixes = pageSuffixes;
  }
  if (ignoreHttpsErrors !== undefined) {
    if (typeof ignoreHttpsErrors !== "boolean") {
      throw invalidField("ignoreHttpsErrors", source);
    }
    overrides.ignoreHttpsErrors = ignoreHttpsErrors;
  }
  if (downloadConcurrency !== undefined) {
    if (typeof downloadConcurrency !== "number" || !Number.isInteger(downloadConcurrency) || downloadConcurrency < 1) {
      throw invalidField("downloadConcurrency", source);
    }
    overrides.downloadConcurrency = downloadConcurrency;
  }
  if (logLevel !== undefined) {
    const parsedLevel = typeof logLevel === "string" ? parseLogLevel(logLevel) : undefined;
    if (!parsedLevel) {
      throw invalidField("logLevel", source);
    }
    overrides.logLevel = parsedLevel;
  }

  return overrides;
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

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  return {
    ...merged,
    listBaseUrl: env.LIST_BASE_URL ?? merged.listBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    datasetPath: env.DATASET_PATH ?? merged.datasetPath,
    logoDir: env.LOGO_DIR ?? merged.logoDir,
    logoExtension: env.LOGO_EXTENSION ?? merged.logoExtension,
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    manifestPath: env.MANIFEST_PATH ?? merged.manifestPath,
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? merged.logLevel,
  };
}

export { DEFAULT_CONFIG };
