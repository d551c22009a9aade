import { LogLevel } from "../observability/types";

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  discoveryConcurrency: number;
  downloadConcurrency: number;
  maxDownloadAttempts: number;
  maxLoginAttempts: number;
  outputDir: string;
  cacheFileName: string;
  autoSelectLatestYear: boolean;
  logLevel: LogLevel;
  logFilePath?: string;
  username?: string;
  password?: string;
}

export type ConfigOverrides = Partial<AppConfig>;
