import fs from "node:fs";
import path from "node:path";
import { CountMap } from "../types";

export const PARTIAL_DOWNLOAD_SUFFIX = ".part";

/**
 * Counts the files under each immediate subfolder of `coursePath`, keyed by
 * folder name. Files lying directly in `coursePath` are not counted.
 */
export async function countFilesPerCategory(coursePath: string): Promise<CountMap> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(coursePath, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return {};
    }
    throw error;
  }

  const counts: CountMap = {};
  for (const entry of entries) {
    if (entry.isDirectory()) {
      counts[entry.name] = await countFiles(path.join(coursePath, entry.name));
    }
  }
  return counts;
}

async function countFiles(folder: string): Promise<number> {
  const entries = await fs.promises.readdir(folder, { withFileTypes: true });
  let total = 0;
  for (const entry of entries) {
    if (entry.isDirectory()) {
      total += await countFiles(path.join(folder, entry.name));
    } else if (entry.isFile() && !entry.name.endsWith(PARTIAL_DOWNLOAD_SUFFIX)) {
      total += 1;
    }
  }
  return total;
}
