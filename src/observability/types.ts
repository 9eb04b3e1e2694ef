export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  step?: string;
  attempt?: number;
  jobName?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "links_discovered"
  | "candidates_selected"
  | "downloads_ok"
  | "downloads_failed"
  | "tables_extracted"
  | "uploads_ok"
  | "uploads_failed"
  | "candidates_failed";

export type MetricTimerName = "fetch_ms" | "download_ms" | "extract_ms" | "upload_ms";
