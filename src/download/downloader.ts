import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import { discardBody, HttpClient } from "../core/http";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { DownloadOutcome, DownloadSummary } from "../types";

interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  http: HttpClient;
  sink: Sink;
  codes: Iterable<string>;
  baseUrl: string;
}

interface LogoTarget {
  code: string;
  url: string;
  outputPath: string;
}

const NOT_FOUND_STATUSES = new Set([404, 410]);

export function ensureTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

export function buildLogoUrl(baseUrl: string, code: string, extension: string): string {
  return `${baseUrl}${code}.${extension}`;
}

/** Runs `worker` over `items` with at most `concurrency` calls outstanding. */
export async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}

async function writeAtomically(outputPath: string, payload: Buffer): Promise<void> {
  const tempPath = `${outputPath}.part`;
  try {
    await fs.promises.writeFile(tempPath, payload);
    await fs.promises.rename(tempPath, outputPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/** Single attempt for one code. Never rejects: every failure becomes a "failed" outcome. */
export async function downloadLogo(http: HttpClient, target: LogoTarget): Promise<DownloadOutcome> {
  const base = { code: target.code, url: target.url };

  try {
    const response = await http.get(target.url, "image/*,*/*");

    if (NOT_FOUND_STATUSES.has(response.status)) {
      await discardBody(response);
      return { ...base, status: "skipped", statusCode: response.status, finishedAt: new Date().toISOString() };
    }

    if (!response.ok) {
      await discardBody(response);
      return {
        ...base,
        status: "failed",
        statusCode: response.status,
        error: `HTTP ${response.status}`,
        finishedAt: new Date().toISOString(),
      };
    }

    const payload = Buffer.from(await response.arrayBuffer());
    await writeAtomically(target.outputPath, payload);
    return {
      ...base,
      status: "saved",
      statusCode: response.status,
      path: target.outputPath,
      bytes: payload.length,
      finishedAt: new Date().toISOString(),
    };
  } catch (error) {
    return { ...base, status: "failed", error: errorMessage(error), finishedAt: new Date().toISOString() };
  }
}

export async function runLogoDownloader(deps: DownloaderDeps): Promise<DownloadSummary> {
  const { config, logger, metrics, http, sink } = deps;
  const baseUrl = ensureTrailingSlash(deps.baseUrl);
  const outputDir = path.resolve(config.logoDir);
  await fs.promises.mkdir(outputDir, { recursive: true });

  const targets: LogoTarget[] = [...deps.codes].map((code) => ({
    code,
    url: buildLogoUrl(baseUrl, code, config.logoExtension),
    outputPath: path.join(outputDir, `${code}.${config.logoExtension}`),
  }));
  const summary: DownloadSummary = { total: targets.length, saved: 0, skipped: 0, failed: 0 };
  logger.info("logo_batch_start", { codes: targets.length, baseUrl, concurrency: config.downloadConcurrency });

  await processWithConcurrency(targets, config.downloadConcurrency, async (target) => {
    const stopTimer = metrics.startTimer("download_ms");
    const outcome = await downloadLogo(http, target);
    const durationMs = stopTimer();

    switch (outcome.status) {
      case "saved":
        summary.saved += 1;
        metrics.incrementCounter("logos_saved", 1);
        logger.info("logo_ok", { code: outcome.code, url: outcome.url, bytes: outcome.bytes, durationMs });
        break;
      case "skipped":
        summary.skipped += 1;
        metrics.incrementCounter("logos_skipped", 1);
        logger.info("logo_skip_not_found", { code: outcome.code, url: outcome.url, statusCode: outcome.statusCode });
        break;
      case "failed":
        summary.failed += 1;
        metrics.incrementCounter("logos_failed", 1);
        logger.warn("logo_err", {
          code: outcome.code,
          url: outcome.url,
          statusCode: outcome.statusCode,
          error: outcome.error,
          durationMs,
        });
        break;
    }

    try {
      await sink.publishDownloadOutcomes([outcome]);
    } catch (error) {
      logger.warn("logo_manifest_append_failed", { code: outcome.code, error: errorMessage(error) });
    }
  });

  logger.info("logo_batch_complete", { ...summary });
  return summary;
}
