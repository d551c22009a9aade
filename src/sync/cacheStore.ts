import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { CatalogIndex, CountMap } from "../types";

export interface CacheCommitSummary {
  written: number;
  failed: string[];
}

export interface CacheStore {
  load(coursePath: string, liveIndex: CatalogIndex, courseName: string): Promise<CountMap>;
  stage(liveIndex: CatalogIndex, coursePath: string): void;
  commit(): Promise<CacheCommitSummary>;
  discard(): void;
}

const CACHE_VERSION = 1;

const cacheFileSchema = z.object({
  version: z.literal(CACHE_VERSION),
  course: z.string(),
  updatedAt: z.string(),
  counts: z.record(z.number().int().nonnegative()),
});

type CacheFile = z.infer<typeof cacheFileSchema>;

interface StagedRecord {
  courseName: string;
  counts: CountMap;
}

/**
 * Keeps one JSON record per course folder. Staged records stay in memory
 * until `commit`, so an interrupted run leaves the last committed record.
 */
export class FileCacheStore implements CacheStore {
  private readonly fileName: string;
  private readonly logger: Logger;
  private readonly staged = new Map<string, StagedRecord>();
  private readonly names = new Map<string, string>();

  constructor(fileName: string, logger: Logger) {
    this.fileName = fileName;
    this.logger = logger;
  }

  cachePathFor(coursePath: string): string {
    return path.join(coursePath, this.fileName);
  }

  async load(coursePath: string, liveIndex: CatalogIndex, courseName: string): Promise<CountMap> {
    this.names.set(coursePath, courseName);
    const cachePath = this.cachePathFor(coursePath);

    let raw: string;
    try {
      raw = await fs.promises.readFile(cachePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug("cache_missing", { course: courseName, path: cachePath });
      } else {
        this.logger.warn("cache_unreadable", { course: courseName, path: cachePath, error: errorMessage(error) });
      }
      return {};
    }

    let parsed: CacheFile;
    try {
      const result = cacheFileSchema.safeParse(JSON.parse(raw));
      if (!result.success) {
        this.logger.warn("cache_invalid", { course: courseName, path: cachePath, error: result.error.message });
        return {};
      }
      parsed = result.data;
    } catch (error) {
      this.logger.warn("cache_invalid", { course: courseName, path: cachePath, error: errorMessage(error) });
      return {};
    }

    const dropped = Object.keys(parsed.counts).filter((category) => !(category in liveIndex.counts));
    if (dropped.length > 0) {
      this.logger.debug("cache_categories_not_on_server", { course: courseName, categories: dropped });
    }

    return { ...parsed.counts };
  }

  stage(liveIndex: CatalogIndex, coursePath: string): void {
    this.staged.set(coursePath, {
      courseName: this.names.get(coursePath) ?? path.basename(coursePath),
      counts: { ...liveIndex.counts },
    });
  }

  async commit(): Promise<CacheCommitSummary> {
    const summary: CacheCommitSummary = { written: 0, failed: [] };
    const updatedAt = new Date().toISOString();

    for (const [coursePath, record] of this.staged) {
      const cachePath = this.cachePathFor(coursePath);
      const payload: CacheFile = {
        version: CACHE_VERSION,
        course: record.courseName,
        updatedAt,
        counts: record.counts,
      };

      try {
        await writeAtomically(cachePath, `${JSON.stringify(payload, null, 2)}\n`);
        summary.written += 1;
        this.logger.debug("cache_committed", { course: record.courseName, path: cachePath });
      } catch (error) {
        summary.failed.push(coursePath);
        this.logger.error("cache_commit_failed", { course: record.courseName, path: cachePath, error: errorMessage(error) });
      }
    }

    this.staged.clear();
    return summary;
  }

  discard(): void {
    this.staged.clear();
  }
}

async function writeAtomically(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tmpPath, content, "utf-8");
  await fs.promises.rename(tmpPath, filePath);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
