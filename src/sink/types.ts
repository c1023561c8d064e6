import { DownloadOutcome } from "../types";

export interface Sink {
  publishDownloadOutcomes(outcomes: DownloadOutcome[]): Promise<void>;
}
