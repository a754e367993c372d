export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  schemeId?: string;
  url?: string;
  path?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "schemes_listed"
  | "archives_downloaded"
  | "archives_skipped"
  | "archives_failed";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "extract_ms";
