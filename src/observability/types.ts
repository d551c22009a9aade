export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  course?: string;
  category?: string;
  url?: string;
  path?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "courses_discovered"
  | "courses_skipped_empty"
  | "categories_scheduled"
  | "files_resolved"
  | "downloads_ok"
  | "downloads_failed";

export type MetricTimerName = "plan_ms" | "resolve_ms" | "download_ms";

export type ProgressReporter = (stage: number, message: string) => void;
