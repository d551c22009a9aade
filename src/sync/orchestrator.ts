import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors";
import { CatalogSource } from "../catalog/types";
import { Logger, MetricsRegistry, ProgressReporter } from "../observability";
import { FileTransfer } from "../transfer/types";
import { CountMap, Course, DownloadResult, FileDescriptor, SyncSummary, SyncTask } from "../types";
import { CacheStore } from "./cacheStore";
import { getCategoryId } from "./catalogIndex";
import { diffCounts, isEmptyCounts } from "./diff";
import { runConcurrent } from "./executor";
import { countFilesPerCategory } from "./localInventory";
import { categoryFolderNames, categoryPathFor, coursePathFor, toPathSegment } from "./paths";

export interface SyncSettings {
  discoveryConcurrency: number;
  downloadConcurrency: number;
}

export interface OrchestratorDeps {
  settings: SyncSettings;
  catalog: CatalogSource;
  transfer: FileTransfer;
  cache: CacheStore;
  logger: Logger;
  metrics: MetricsRegistry;
  progress: ProgressReporter;
}

export interface RunOptions {
  dryRun?: boolean;
}

function describeCourse(course: Course): Record<string, unknown> {
  return { course: course.name, courseId: course.id, year: course.year };
}

/**
 * Drives a sync run: plan each course against its cache and local folder,
 * resolve the listings of flagged categories, download what is missing and
 * commit the cache once at the end.
 */
export class SyncOrchestrator {
  private readonly deps: OrchestratorDeps;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  async planCourse(course: Course, basePath: string, options: RunOptions = {}): Promise<SyncTask[]> {
    const { catalog, cache, logger, metrics } = this.deps;
    const index = await catalog.listCategoryIndex(course);

    if (isEmptyCounts(index.counts)) {
      metrics.incrementCounter("courses_skipped_empty", 1);
      logger.info("course_has_no_documents", describeCourse(course));
      return [];
    }
    metrics.incrementCounter("courses_discovered", 1);

    const coursePath = coursePathFor(basePath, course);
    if (!options.dryRun) {
      await fs.promises.mkdir(coursePath, { recursive: true });
    }
    const folders = categoryFolderNames(index.categoryIds);
    logger.debug("course_index", { ...describeCourse(course), counts: index.counts });

    const cached = await cache.load(coursePath, index, course.name);
    const flagged = new Set<string>();

    const serverDiff = diffCounts(index.counts, cached);
    if (isEmptyCounts(serverDiff)) {
      logger.debug("course_matches_cache", describeCourse(course));
    } else {
      logger.info("course_server_ahead_of_cache", { ...describeCourse(course), cached, serverDiff });
      cache.stage(index, coursePath);
      Object.keys(serverDiff).forEach((category) => flagged.add(category));
    }

    const folderDiff = diffCounts(cached, await this.localCountsFor(coursePath, cached, folders));
    if (isEmptyCounts(folderDiff)) {
      logger.debug("course_folder_matches_cache", describeCourse(course));
    } else {
      logger.warn("course_folder_behind_cache", { ...describeCourse(course), cached, folderDiff });
      Object.keys(folderDiff).forEach((category) => flagged.add(category));
    }

    const tasks: SyncTask[] = [];
    for (const category of flagged) {
      const categoryId = getCategoryId(index, category);
      if (categoryId === undefined) {
        logger.warn("category_missing_on_server", { ...describeCourse(course), category });
        continue;
      }
      tasks.push({ category, categoryId, course, coursePath, folderName: folders[category] ?? toPathSegment(category) });
    }

    metrics.incrementCounter("categories_scheduled", tasks.length);
    logger.debug("course_plan_complete", { ...describeCourse(course), categories: tasks.map((task) => task.category) });
    return tasks;
  }

  async resolveTask(task: SyncTask): Promise<FileDescriptor[]> {
    const { catalog, transfer, logger, metrics } = this.deps;
    try {
      const entries = await catalog.listCategoryFiles(task.course, task.categoryId);
      const folder = categoryPathFor(task.coursePath, task.folderName);
      const descriptors: FileDescriptor[] = [];
      const targets = new Set<string>();

      for (const entry of entries) {
        const descriptor = await transfer.resolveLocal(entry, folder);
        if (!descriptor) {
          continue;
        }
        if (targets.has(descriptor.targetPath)) {
          logger.warn("category_duplicate_file", {
            ...describeCourse(task.course),
            category: task.category,
            path: descriptor.targetPath,
          });
          continue;
        }
        targets.add(descriptor.targetPath);
        descriptors.push(descriptor);
      }

      metrics.incrementCounter("files_resolved", descriptors.length);
      logger.debug("category_resolved", {
        ...describeCourse(task.course),
        category: task.category,
        listed: entries.length,
        missing: descriptors.length,
      });
      return descriptors;
    } catch (error) {
      logger.error("category_resolve_failed", {
        ...describeCourse(task.course),
        category: task.category,
        error: errorMessage(error),
      });
      return [];
    }
  }

  async run(courses: Course[], basePath: string, options: RunOptions = {}): Promise<SyncSummary> {
    const { settings, transfer, cache, logger, metrics, progress } = this.deps;
    const dryRun = options.dryRun ?? false;
    const startedAt = Date.now();

    progress(2, "Checking courses for new documents...");
    const stopPlan = metrics.startTimer("plan_ms");
    const planned = await runConcurrent(courses, (course) => this.planCourse(course, basePath, { dryRun }), {
      concurrency: settings.discoveryConcurrency,
      logger,
      label: "course_plan",
      describe: describeCourse,
    });
    stopPlan();

    progress(3, "Resolving files to download...");
    const stopResolve = metrics.startTimer("resolve_ms");
    const resolved = await runConcurrent(planned.results, (task) => this.resolveTask(task), {
      concurrency: settings.discoveryConcurrency,
      logger,
      label: "category_resolve",
      describe: (task) => ({ ...describeCourse(task.course), category: task.category }),
    });
    stopResolve();
    const worklist = resolved.results;

    const summary: SyncSummary = {
      courses: courses.length,
      tasks: planned.results.length,
      filesQueued: worklist.length,
      downloaded: 0,
      failed: 0,
      bytes: 0,
      durationMs: 0,
      folders: [],
      dryRun,
      pending: [],
    };

    if (dryRun) {
      cache.discard();
      progress(4, `Dry run: ${worklist.length} files would be downloaded.`);
      summary.pending = [...worklist].sort((left, right) => left.targetPath.localeCompare(right.targetPath));
      summary.durationMs = Date.now() - startedAt;
      return summary;
    }

    let downloads: DownloadResult[] = [];
    if (worklist.length === 0) {
      progress(4, "No files to download.");
    } else {
      progress(4, `Downloading ${worklist.length} missing files...`);
      const outcome = await runConcurrent(
        worklist,
        async (descriptor) => {
          const stopDownload = metrics.startTimer("download_ms");
          try {
            return await transfer.download(descriptor);
          } finally {
            stopDownload();
          }
        },
        {
          concurrency: settings.downloadConcurrency,
          logger,
          label: "download",
          describe: (descriptor) => ({ url: descriptor.url, path: descriptor.targetPath }),
        },
      );
      downloads = outcome.results;
      summary.failed = outcome.failures.length;
      metrics.incrementCounter("downloads_ok", downloads.length);
      metrics.incrementCounter("downloads_failed", outcome.failures.length);
      progress(4, "All files processed.");
    }

    progress(5, "Updating cache...");
    const committed = await cache.commit();
    logger.debug("cache_commit_complete", { written: committed.written, failed: committed.failed.length });

    summary.downloaded = downloads.length;
    summary.bytes = downloads.reduce((total, result) => total + result.bytes, 0);
    summary.folders = [...new Set(downloads.map((result) => path.dirname(result.targetPath)))].sort();
    summary.durationMs = Date.now() - startedAt;
    progress(6, "Done.");
    return summary;
  }

  // Cached categories are looked up by their folder name; a missing folder counts as empty.
  private async localCountsFor(coursePath: string, cached: CountMap, folders: Record<string, string>): Promise<CountMap> {
    const inventory = await countFilesPerCategory(coursePath);
    const local: CountMap = {};
    for (const category of Object.keys(cached)) {
      local[category] = inventory[folders[category] ?? toPathSegment(category)] ?? 0;
    }
    return local;
  }
}
