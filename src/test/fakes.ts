import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CatalogSource } from "../catalog/types";
import { Logger } from "../observability";
import { createCatalogIndex } from "../sync/catalogIndex";
import { toPathSegment } from "../sync/paths";
import { FileTransfer } from "../transfer/types";
import { CatalogIndex, Course, DownloadResult, FileDescriptor, RemoteFileEntry } from "../types";

export const MODIFIED_AT = "2024-03-01T10:00:00.000Z";

export function quietLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run", level: "error" });
}

export async function makeTempDir(prefix = "catalog-sync-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function makeCourse(overrides: Partial<Course> = {}): Course {
  return {
    year: "2024",
    semester: "1",
    semesterType: "s",
    id: "101",
    name: "Algorithms",
    ...overrides,
  };
}

function fileEntries(category: string, count: number): RemoteFileEntry[] {
  return Array.from({ length: count }, (_, index) => ({
    name: `${category.toLowerCase()}-${index + 1}.pdf`,
    url: `https://catalog.test/files/${encodeURIComponent(category)}/${index + 1}`,
    size: 100,
    modifiedAt: MODIFIED_AT,
  }));
}

/** Serves category counts per course id; every category lists `count` files. */
export class FakeCatalog implements CatalogSource {
  readonly fileListCalls: Array<{ courseId: string; categoryId: string }> = [];
  readonly failingCourses = new Set<string>();
  readonly failingCategories = new Set<string>();
  private readonly counts = new Map<string, Record<string, number>>();

  setCounts(courseId: string, counts: Record<string, number>): void {
    this.counts.set(courseId, { ...counts });
  }

  async listYears(): Promise<Record<string, string>> {
    return { "2023/24": "2024" };
  }

  async listCourses(_yearKey: string): Promise<Course[]> {
    return [];
  }

  async listCategoryIndex(course: Course): Promise<CatalogIndex> {
    if (this.failingCourses.has(course.id)) {
      throw new Error(`index unavailable for ${course.id}`);
    }
    const counts = this.counts.get(course.id) ?? {};
    return createCatalogIndex(
      Object.entries(counts).map(([name, count]) => ({ name, id: `cat-${name}`, count })),
    );
  }

  async listCategoryFiles(course: Course, categoryId: string): Promise<RemoteFileEntry[]> {
    this.fileListCalls.push({ courseId: course.id, categoryId });
    if (this.failingCategories.has(categoryId)) {
      throw new Error(`listing unavailable for ${categoryId}`);
    }
    const category = categoryId.replace(/^cat-/, "");
    const count = this.counts.get(course.id)?.[category] ?? 0;
    return fileEntries(category, count);
  }
}

/** Writes placeholder files instead of fetching them. */
export class FakeTransfer implements FileTransfer {
  readonly downloaded: string[] = [];
  readonly failingUrls = new Set<string>();

  async resolveLocal(entry: RemoteFileEntry, targetFolder: string): Promise<FileDescriptor | undefined> {
    const targetPath = path.join(targetFolder, toPathSegment(entry.name));
    if (fs.existsSync(targetPath)) {
      return undefined;
    }
    return { targetPath, url: entry.url, size: entry.size, modifiedAt: entry.modifiedAt };
  }

  async download(descriptor: FileDescriptor): Promise<DownloadResult> {
    if (this.failingUrls.has(descriptor.url)) {
      throw new Error(`transfer failed for ${descriptor.url}`);
    }
    await fs.promises.mkdir(path.dirname(descriptor.targetPath), { recursive: true });
    await fs.promises.writeFile(descriptor.targetPath, "placeholder");
    this.downloaded.push(descriptor.targetPath);
    return {
      targetPath: descriptor.targetPath,
      url: descriptor.url,
      status: "downloaded_ok",
      bytes: 11,
      attempt: 1,
      downloadedAt: new Date().toISOString(),
    };
  }
}
