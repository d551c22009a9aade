import path from "node:path";
import { Course } from "../types";

const INVALID_SEGMENT_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

export function toPathSegment(name: string): string {
  const cleaned = name.replace(INVALID_SEGMENT_CHARS, "_").trim();
  if (cleaned === "" || cleaned === "." || cleaned === "..") {
    return "_";
  }
  return cleaned;
}

export function coursePathFor(basePath: string, course: Course): string {
  const period = `${course.semester}${course.semesterType.toUpperCase()}`;
  return path.join(basePath, toPathSegment(course.year), toPathSegment(period), toPathSegment(course.name));
}

export function categoryPathFor(coursePath: string, folderName: string): string {
  return path.join(coursePath, folderName);
}

/**
 * Maps each category to its folder name. When two categories clean up to the
 * same segment, the later one in sort order gets its category id appended.
 */
export function categoryFolderNames(categoryIds: Record<string, string>): Record<string, string> {
  const folders: Record<string, string> = {};
  const taken = new Set<string>();
  for (const category of Object.keys(categoryIds).sort()) {
    let folder = toPathSegment(category);
    if (taken.has(folder)) {
      folder = toPathSegment(`${folder} (${categoryIds[category]})`);
    }
    taken.add(folder);
    folders[category] = folder;
  }
  return folders;
}
