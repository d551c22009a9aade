export type CountMap = Record<string, number>;

export interface Course {
  year: string;
  semester: string;
  semesterType: string;
  id: string;
  name: string;
}

export interface CatalogIndex {
  counts: CountMap;
  categoryIds: Record<string, string>;
}

export interface SyncTask {
  category: string;
  categoryId: string;
  course: Course;
  coursePath: string;
  folderName: string;
}

export interface RemoteFileEntry {
  name: string;
  url: string;
  size: number;
  modifiedAt: string;
}

export interface FileDescriptor {
  targetPath: string;
  url: string;
  size: number;
  modifiedAt: string;
}

export interface DownloadResult {
  targetPath: string;
  url: string;
  status: "downloaded_ok";
  bytes: number;
  attempt: number;
  downloadedAt: string;
}

export interface SyncSummary {
  courses: number;
  tasks: number;
  filesQueued: number;
  downloaded: number;
  failed: number;
  bytes: number;
  durationMs: number;
  folders: string[];
  dryRun: boolean;
  pending: FileDescriptor[];
}
