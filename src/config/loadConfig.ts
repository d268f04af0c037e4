import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import type { AppConfig, ConfigOverrides, NoveltyPolicy, OutputDirs, SinkType, StoreMode } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  sourceUrls: [
    "https://sbi.co.in/documents/16012/1400784/FOREX_CARD_RATES.pdf",
    "https://bank.sbi/documents/16012/1400784/FOREX_CARD_RATES.pdf",
  ],
  userAgent: "forex-rates-watcher/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  sourceUtcOffset: "+05:30",
  noveltyPolicy: "hash_or_newer",
  filePrefix: "FOREX_CARD_RATES",
  ratesFilePrefix: "REFERENCE_RATES",
  storeMode: "json",
  statePath: "data/last_download.json",
  sqlitePath: "data/state.sqlite",
  lockStaleMinutes: 10,
  outputDirs: {
    downloads: "downloads",
    rates: "data/rates",
    manifests: "data/manifests",
  },
  logFilePath: undefined,
  sinkType: "local_jsonl",
  httpSinkEndpoint: undefined,
  httpSinkToken: undefined,
};

const OFFSET_PATTERN = /^[+-](?:[01]\d|2[0-3]):[0-5]\d$/;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStoreMode(value: unknown): value is StoreMode {
  return value === "json" || value === "sqlite";
}

function isNoveltyPolicy(value: unknown): value is NoveltyPolicy {
  return value === "hash_or_newer" || value === "hash_and_timestamp";
}

function isSinkType(value: unknown): value is SinkType {
  return value === "local_jsonl" || value === "http" || value === "none";
}

function pickString(source: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${file}: "${key}" must be a string`);
  }
  return value;
}

function pickNumber(source: Record<string, unknown>, key: string, file: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${file}: "${key}" must be a number`);
  }
  return value;
}

function pickBoolean(source: Record<string, unknown>, key: string, file: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${file}: "${key}" must be a boolean`);
  }
  return value;
}

function pickEnum<T extends string>(
  source: Record<string, unknown>,
  key: string,
  file: string,
  guard: (value: unknown) => value is T,
): T | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!guard(value)) {
    throw new ConfigError(`${file}: unsupported value for "${key}": ${String(value)}`);
  }
  return value;
}

function parseOverrides(raw: unknown, file: string): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new ConfigError(`${file}: expected a JSON object`);
  }

  let sourceUrls: string[] | undefined;
  const rawUrls = raw.sourceUrls;
  if (rawUrls !== undefined) {
    if (!Array.isArray(rawUrls) || !rawUrls.every((url): url is string => typeof url === "string")) {
      throw new ConfigError(`${file}: "sourceUrls" must be an array of strings`);
    }
    sourceUrls = rawUrls;
  }

  let outputDirs: Partial<OutputDirs> | undefined;
  const rawDirs = raw.outputDirs;
  if (rawDirs !== undefined) {
    if (!isRecord(rawDirs)) {
      throw new ConfigError(`${file}: "outputDirs" must be an object`);
    }
    outputDirs = {
      downloads: pickString(rawDirs, "downloads", file),
      rates: pickString(rawDirs, "rates", file),
      manifests: pickString(rawDirs, "manifests", file),
    };
  }

  return {
    sourceUrls,
    userAgent: pickString(raw, "userAgent", file),
    ignoreHttpsErrors: pickBoolean(raw, "ignoreHttpsErrors", file),
    requestTimeoutMs: pickNumber(raw, "requestTimeoutMs", file),
    sourceUtcOffset: pickString(raw, "sourceUtcOffset", file),
    noveltyPolicy: pickEnum(raw, "noveltyPolicy", file, isNoveltyPolicy),
    filePrefix: pickString(raw, "filePrefix", file),
    ratesFilePrefix: pickString(raw, "ratesFilePrefix", file),
    storeMode: pickEnum(raw, "storeMode", file, isStoreMode),
    statePath: pickString(raw, "statePath", file),
    sqlitePath: pickString(raw, "sqlitePath", file),
    lockStaleMinutes: pickNumber(raw, "lockStaleMinutes", file),
    outputDirs,
    logFilePath: pickString(raw, "logFilePath", file),
    sinkType: pickEnum(raw, "sinkType", file, isSinkType),
    httpSinkEndpoint: pickString(raw, "httpSinkEndpoint", file),
    httpSinkToken: pickString(raw, "httpSinkToken", file),
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
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }
  return parseOverrides(parsed, absolutePath);
}

function toInt(name: string, value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`${name} must be a whole number, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

function toBool(name: string, value: string | undefined, fallback: boolean): boolean {
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
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

function toEnum<T extends string>(
  name: string,
  value: string | undefined,
  guard: (candidate: unknown) => candidate is T,
  fallback: T,
): T {
  if (!value) {
    return fallback;
  }
  if (!guard(value)) {
    throw new ConfigError(`${name} has unknown value "${value}"`);
  }
  return value;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function validate(config: AppConfig): AppConfig {
  if (config.sourceUrls.length === 0) {
    throw new ConfigError("At least one source url is required");
  }
  for (const url of config.sourceUrls) {
    let protocol: string;
    try {
      protocol = new URL(url).protocol;
    } catch {
      throw new ConfigError(`Invalid source url: ${url}`);
    }
    if (protocol !== "http:" && protocol !== "https:") {
      throw new ConfigError(`Unsupported protocol in source url: ${url}`);
    }
  }
  if (!OFFSET_PATTERN.test(config.sourceUtcOffset)) {
    throw new ConfigError(`sourceUtcOffset must look like +05:30, got ${config.sourceUtcOffset}`);
  }
  if (config.requestTimeoutMs <= 0) {
    throw new ConfigError("requestTimeoutMs must be positive");
  }
  if (config.lockStaleMinutes <= 0) {
    throw new ConfigError("lockStaleMinutes must be positive");
  }
  if (config.filePrefix.trim() === "" || /[\\/]/.test(config.filePrefix)) {
    throw new ConfigError(`filePrefix must be a plain file name prefix, got "${config.filePrefix}"`);
  }
  if (/[\\/]/.test(config.ratesFilePrefix)) {
    throw new ConfigError(`ratesFilePrefix must be a plain file name prefix, got "${config.ratesFilePrefix}"`);
  }
  if (config.sinkType === "http" && !config.httpSinkEndpoint) {
    throw new ConfigError("httpSinkEndpoint is required when sinkType is http");
  }
  return config;
}

export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    sourceUrls: fileConfig.sourceUrls ?? DEFAULT_CONFIG.sourceUrls,
    userAgent: fileConfig.userAgent ?? DEFAULT_CONFIG.userAgent,
    ignoreHttpsErrors: fileConfig.ignoreHttpsErrors ?? DEFAULT_CONFIG.ignoreHttpsErrors,
    requestTimeoutMs: fileConfig.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    sourceUtcOffset: fileConfig.sourceUtcOffset ?? DEFAULT_CONFIG.sourceUtcOffset,
    noveltyPolicy: fileConfig.noveltyPolicy ?? DEFAULT_CONFIG.noveltyPolicy,
    filePrefix: fileConfig.filePrefix ?? DEFAULT_CONFIG.filePrefix,
    ratesFilePrefix: fileConfig.ratesFilePrefix ?? DEFAULT_CONFIG.ratesFilePrefix,
    storeMode: fileConfig.storeMode ?? DEFAULT_CONFIG.storeMode,
    statePath: fileConfig.statePath ?? DEFAULT_CONFIG.statePath,
    sqlitePath: fileConfig.sqlitePath ?? DEFAULT_CONFIG.sqlitePath,
    lockStaleMinutes: fileConfig.lockStaleMinutes ?? DEFAULT_CONFIG.lockStaleMinutes,
    logFilePath: fileConfig.logFilePath ?? DEFAULT_CONFIG.logFilePath,
    sinkType: fileConfig.sinkType ?? DEFAULT_CONFIG.sinkType,
    httpSinkEndpoint: fileConfig.httpSinkEndpoint ?? DEFAULT_CONFIG.httpSinkEndpoint,
    httpSinkToken: fileConfig.httpSinkToken ?? DEFAULT_CONFIG.httpSinkToken,
    outputDirs: {
      downloads: fileConfig.outputDirs?.downloads ?? DEFAULT_CONFIG.outputDirs.downloads,
      rates: fileConfig.outputDirs?.rates ?? DEFAULT_CONFIG.outputDirs.rates,
      manifests: fileConfig.outputDirs?.manifests ?? DEFAULT_CONFIG.outputDirs.manifests,
    },
  };

  return validate({
    ...merged,
    sourceUrls: toList(env.SOURCE_URLS, merged.sourceUrls),
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool("IGNORE_HTTPS_ERRORS", env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt("REQUEST_TIMEOUT_MS", env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    sourceUtcOffset: env.SOURCE_UTC_OFFSET ?? merged.sourceUtcOffset,
    noveltyPolicy: toEnum("NOVELTY_POLICY", env.NOVELTY_POLICY, isNoveltyPolicy, merged.noveltyPolicy),
    filePrefix: env.FILE_PREFIX ?? merged.filePrefix,
    ratesFilePrefix: env.RATES_FILE_PREFIX ?? merged.ratesFilePrefix,
    storeMode: toEnum("STORE_MODE", env.STORE_MODE, isStoreMode, merged.storeMode),
    statePath: env.STATE_PATH ?? merged.statePath,
    sqlitePath: env.SQLITE_PATH ?? merged.sqlitePath,
    lockStaleMinutes: toInt("LOCK_STALE_MINUTES", env.LOCK_STALE_MINUTES, merged.lockStaleMinutes),
    logFilePath: env.LOG_FILE_PATH ?? merged.logFilePath,
    sinkType: toEnum("SINK_TYPE", env.SINK_TYPE, isSinkType, merged.sinkType),
    httpSinkEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.httpSinkEndpoint,
    httpSinkToken: env.HTTP_SINK_TOKEN ?? merged.httpSinkToken,
    outputDirs: {
      downloads: env.DOWNLOADS_DIR ?? merged.outputDirs.downloads,
      rates: env.RATES_DIR ?? merged.outputDirs.rates,
      manifests: env.MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  });
}

/** The lock sits beside whichever file holds the current record. */
export function stateLockPath(config: AppConfig): string {
  const statePath = config.storeMode === "sqlite" ? config.sqlitePath : config.statePath;
  return `${path.resolve(statePath)}.lock`;
}

export { DEFAULT_CONFIG };
