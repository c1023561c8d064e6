import { AppConfig } from "../config";
import { LocalJsonlSink } from "./localJsonlSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  return new LocalJsonlSink(config, runId);
}

export * from "./types";
