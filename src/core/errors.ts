export type ScrapeErrorCode =
  | "MISSING_ARGUMENT"
  | "HTTP_CLIENT"
  | "NO_TABLE"
  | "DATASET_WRITE"
  | "DATASET_READ"
  | "COLUMN_NOT_FOUND";

/** Fatal condition: stops the whole run and surfaces to the entry point. */
export class ScrapeError extends Error {
  public readonly code: ScrapeErrorCode;

  constructor(message: string, code: ScrapeErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingArgumentError extends ScrapeError {
  constructor(message: string) {
    super(message, "MISSING_ARGUMENT");
  }
}

export class HttpClientError extends ScrapeError {
  constructor(cause: unknown) {
    super(`http client: ${errorMessage(cause)}`, "HTTP_CLIENT", cause);
  }
}

export class NoTableError extends ScrapeError {
  constructor(marker: string) {
    super(`no pages yielded a wikitable with a ${marker} header`, "NO_TABLE");
  }
}

export class DatasetWriteError extends ScrapeError {
  constructor(filePath: string, cause: unknown) {
    super(`cannot write dataset ${filePath}: ${errorMessage(cause)}`, "DATASET_WRITE", cause);
  }
}

export class DatasetReadError extends ScrapeError {
  constructor(filePath: string, cause: unknown) {
    super(`cannot read dataset ${filePath}: ${errorMessage(cause)}`, "DATASET_READ", cause);
  }
}

export class ColumnNotFoundError extends ScrapeError {
  constructor(column: string, filePath: string) {
    super(`${column} column not found in ${filePath}`, "COLUMN_NOT_FOUND");
  }
}

export type HttpErrorKind = "transport" | "status";

/** Failure of a single request; recoverable at the caller's boundary. */
export class HttpError extends Error {
  public readonly kind: HttpErrorKind;
  public readonly url: string;
  public readonly status?: number;

  constructor(kind: HttpErrorKind, url: string, options: { status?: number; cause?: unknown } = {}) {
    const detail = kind === "status" ? `HTTP ${options.status}` : `transport error: ${errorMessage(options.cause)}`;
    super(`${detail} while fetching ${url}`, { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.url = url;
    this.status = options.status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
