export * from "./logger";
export * from "./metrics";
export * from "./runId";
export * from "./types";
