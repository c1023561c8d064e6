/** Header row plus data rows of one page's qualifying table. */
export interface RawTable {
  header: string[];
  rows: string[][];
}

export interface PageRef {
  suffix: string;
  url: string;
}

export interface ScrapeResult {
  header: string[];
  rows: string[][];
  pagesVisited: number;
  pagesWithTable: number;
}

export type DownloadStatus = "saved" | "skipped" | "failed";

export interface DownloadOutcome {
  code: string;
  url: string;
  status: DownloadStatus;
  path?: string;
  bytes?: number;
  statusCode?: number;
  error?: string;
  finishedAt: string;
}

export interface DownloadSummary {
  total: number;
  saved: number;
  skipped: number;
  failed: number;
}
