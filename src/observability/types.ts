export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  code?: string;
  statusCode?: number;
  error?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "pages_failed"
  | "pages_without_table"
  | "rows_extracted"
  | "codes_collected"
  | "logos_saved"
  | "logos_skipped"
  | "logos_failed";

export type MetricTimerName = "page_fetch_ms" | "download_ms";
