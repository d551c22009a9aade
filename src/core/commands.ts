import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { CatalogAuthenticator, CatalogSource, Credentials, HttpCatalogAuthenticator, HttpCatalogSource, loginWithRetry, Session } from "../catalog";
import { Logger, MetricsRegistry, ProgressReporter } from "../observability";
import { FileCacheStore, SyncOrchestrator } from "../sync";
import { FileTransfer, LocalFileTransfer } from "../transfer";
import { SyncSummary } from "../types";
import { AuthError, errorMessage, TargetDirectoryError } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  progress: ProgressReporter;
  print: (line: string) => void;
}

export interface SyncServices {
  authenticator: CatalogAuthenticator;
  createSource(session: Session): CatalogSource;
  createTransfer(session: Session): FileTransfer;
}

export interface SyncCommandOptions {
  targetPath?: string;
  yearLabel?: string;
  autoSelectLatestYear?: boolean;
  dryRun?: boolean;
}

export interface SelectedYear {
  label: string;
  key: string;
}

export function createHttpServices(ctx: Pick<CommandContext, "config" | "logger">): SyncServices {
  return {
    authenticator: new HttpCatalogAuthenticator(ctx.config),
    createSource: (session) => new HttpCatalogSource(ctx.config, session),
    createTransfer: (session) =>
      new LocalFileTransfer({ config: ctx.config, logger: ctx.logger.child("transfer"), cookie: session.cookie }),
  };
}

export function credentialsFromConfig(config: Pick<AppConfig, "username" | "password">): Credentials {
  if (!config.username || config.password === undefined) {
    throw new AuthError("Missing credentials: set CATALOG_USERNAME and CATALOG_PASSWORD or add them to the config file");
  }
  return { username: config.username, password: config.password };
}

export function selectYear(
  years: Record<string, string>,
  options: { yearLabel?: string; autoSelectLatestYear: boolean },
): SelectedYear {
  const entries = Object.entries(years);
  if (entries.length === 0) {
    throw new Error("No academic years found for this account");
  }

  if (options.yearLabel !== undefined) {
    const key = years[options.yearLabel];
    if (key === undefined) {
      throw new Error(`Unknown academic year "${options.yearLabel}"; available: ${Object.keys(years).join(", ")}`);
    }
    return { label: options.yearLabel, key };
  }

  if (entries.length > 1 && !options.autoSelectLatestYear) {
    throw new Error(`Several academic years found (${Object.keys(years).join(", ")}); choose one with --year`);
  }

  const [label, key] = [...entries].sort((left, right) => left[1].localeCompare(right[1], undefined, { numeric: true }))[
    entries.length - 1
  ];
  return { label, key };
}

export async function ensureTargetDirectory(targetPath: string): Promise<string> {
  const absolutePath = path.resolve(targetPath);
  let stats: fs.Stats | undefined;
  try {
    stats = await fs.promises.stat(absolutePath);
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw new TargetDirectoryError(`Cannot access ${absolutePath}: ${errorMessage(error)}`, absolutePath, { cause: error });
    }
  }

  if (stats && !stats.isDirectory()) {
    throw new TargetDirectoryError(`${absolutePath} is not a directory`, absolutePath);
  }
  if (!stats) {
    try {
      await fs.promises.mkdir(absolutePath, { recursive: true });
    } catch (error) {
      throw new TargetDirectoryError(`Cannot create ${absolutePath}: ${errorMessage(error)}`, absolutePath, { cause: error });
    }
  }
  return absolutePath;
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export function formatSummary(summary: SyncSummary): string[] {
  if (summary.dryRun) {
    if (summary.pending.length === 0) {
      return ["No new files found."];
    }
    return [`${summary.pending.length} files would be downloaded:`, ...summary.pending.map((file) => `'${file.targetPath}'`)];
  }

  const lines: string[] = [];
  if (summary.downloaded === 0) {
    lines.push("No new files found.");
  } else {
    const seconds = (summary.durationMs / 1000).toFixed(1);
    lines.push(`Transferred ${summary.downloaded} files (${formatBytes(summary.bytes)} in ${seconds}s) to the folders:`);
    lines.push(...summary.folders.map((folder) => `'${folder}'`));
  }
  if (summary.failed > 0) {
    lines.push(`${summary.failed} files failed and will be retried on the next run.`);
  }
  return lines;
}

async function login(ctx: CommandContext, services: SyncServices): Promise<Session> {
  return loginWithRetry(
    services.authenticator,
    () => credentialsFromConfig(ctx.config),
    ctx.config.maxLoginAttempts,
    ctx.logger.child("login"),
  );
}

export async function runSyncCommand(
  ctx: CommandContext,
  options: SyncCommandOptions = {},
  services: SyncServices = createHttpServices(ctx),
): Promise<SyncSummary> {
  const basePath = await ensureTargetDirectory(options.targetPath ?? ctx.config.outputDir);
  ctx.logger.info("sync_start", { path: basePath, dryRun: options.dryRun ?? false });

  const session = await login(ctx, services);
  const source = services.createSource(session);
  const year = selectYear(await source.listYears(), {
    yearLabel: options.yearLabel,
    autoSelectLatestYear: options.autoSelectLatestYear ?? ctx.config.autoSelectLatestYear,
  });
  ctx.logger.info("year_selected", { ...year });

  ctx.progress(1, "Looking for enrolled courses...");
  const courses = await source.listCourses(year.key);
  ctx.logger.info("courses_found", { year: year.label, courses: courses.map((course) => course.name) });

  const orchestrator = new SyncOrchestrator({
    settings: {
      discoveryConcurrency: ctx.config.discoveryConcurrency,
      downloadConcurrency: ctx.config.downloadConcurrency,
    },
    catalog: source,
    transfer: services.createTransfer(session),
    cache: new FileCacheStore(ctx.config.cacheFileName, ctx.logger.child("cache")),
    logger: ctx.logger.child("sync"),
    metrics: ctx.metrics,
    progress: ctx.progress,
  });

  const summary = await orchestrator.run(courses, basePath, { dryRun: options.dryRun });
  ctx.logger.info("sync_complete", {
    courses: summary.courses,
    tasks: summary.tasks,
    filesQueued: summary.filesQueued,
    downloaded: summary.downloaded,
    failed: summary.failed,
    bytes: summary.bytes,
    durationMs: summary.durationMs,
  });
  formatSummary(summary).forEach((line) => ctx.print(line));
  return summary;
}

export async function runYearsCommand(
  ctx: CommandContext,
  services: SyncServices = createHttpServices(ctx),
): Promise<Record<string, string>> {
  const session = await login(ctx, services);
  const years = await services.createSource(session).listYears();
  const labels = Object.keys(years);
  if (labels.length === 0) {
    throw new Error("No academic years found for this account");
  }
  ctx.logger.info("years_found", { years });
  labels.forEach((label) => ctx.print(`${label} (${years[label]})`));
  return years;
}
