import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { LogLevel } from "../observability/types";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://catalog.example.edu/",
  userAgent: "course-catalog-sync/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 120_000,
  discoveryConcurrency: 16,
  downloadConcurrency: 4,
  maxDownloadAttempts: 3,
  maxLoginAttempts: 3,
  outputDir: "catalog",
  cacheFileName: ".catalog-cache.json",
  autoSelectLatestYear: true,
  logLevel: "info",
  logFilePath: undefined,
  username: undefined,
  password: undefined,
};

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const configFileSchema = z
  .object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    downloadTimeoutMs: z.number().int().positive(),
    discoveryConcurrency: z.number().int().positive(),
    downloadConcurrency: z.number().int().positive(),
    maxDownloadAttempts: z.number().int().positive(),
    maxLoginAttempts: z.number().int().positive(),
    outputDir: z.string().min(1),
    cacheFileName: z.string().min(1),
    autoSelectLatestYear: z.boolean(),
    logLevel: logLevelSchema,
    logFilePath: z.string().min(1),
    username: z.string().min(1),
    password: z.string(),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw: unknown = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    throw new Error(`Invalid config file ${absolutePath}: ${issues}`);
  }
  return parsed.data;
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
  const parsed = logLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    ...merged,
    baseUrl: env.CATALOG_BASE_URL ?? merged.baseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    discoveryConcurrency: toInt(env.DISCOVERY_CONCURRENCY, merged.discoveryConcurrency),
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    maxDownloadAttempts: toInt(env.MAX_DOWNLOAD_ATTEMPTS, merged.maxDownloadAttempts),
    maxLoginAttempts: toInt(env.MAX_LOGIN_ATTEMPTS, merged.maxLoginAttempts),
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    cacheFileName: env.CACHE_FILE_NAME ?? merged.cacheFileName,
    autoSelectLatestYear: toBool(env.AUTO_SELECT_LATEST_YEAR, merged.autoSelectLatestYear),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    logFilePath: env.LOG_FILE ?? merged.logFilePath,
    username: env.CATALOG_USERNAME ?? merged.username,
    password: env.CATALOG_PASSWORD ?? merged.password,
  };
}

export { DEFAULT_CONFIG };
