import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { DownloadOutcome } from "../types";
import { Sink } from "./types";

/** Appends one JSON line per download outcome to the configured manifest file. */
export class LocalJsonlSink implements Sink {
  private readonly manifestPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    this.manifestPath = path.resolve(config.manifestPath);
    this.runId = runId;
  }

  async publishDownloadOutcomes(outcomes: DownloadOutcome[]): Promise<void> {
    await this.appendLines(
      outcomes.map((outcome) => ({
        runId: this.runId,
        ...outcome,
      })),
    );
  }

  private async appendLines(records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.mkdir(path.dirname(this.manifestPath), { recursive: true });
    await fs.promises.appendFile(this.manifestPath, content, "utf-8");
  }
}
