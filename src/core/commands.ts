import { AppConfig } from "../config";
import { scrapeAirlinePages } from "../crawl/crawler";
import { collectAirlineCodes } from "../dataset/codes";
import { writeDataset } from "../dataset/writer";
import { runLogoDownloader } from "../download/downloader";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { DownloadSummary } from "../types";
import { HttpClient } from "./http";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  http: HttpClient;
  sink: Sink;
}

export async function runScrape(ctx: CommandContext): Promise<void> {
  ctx.logger.info("scrape_start", { listBaseUrl: ctx.config.listBaseUrl, pages: ctx.config.pageSuffixes.length });
  const result = await scrapeAirlinePages({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    http: ctx.http,
  });

  const written = await writeDataset(ctx.config.datasetPath, result.header, result.rows);
  ctx.logger.info("dataset_written", { ...written });
}

export async function runDownload(ctx: CommandContext, baseUrl: string): Promise<DownloadSummary> {
  const codes = await collectAirlineCodes(ctx.config.datasetPath, ctx.config.markerColumn);
  ctx.metrics.incrementCounter("codes_collected", codes.size);
  ctx.logger.info("codes_collected", { datasetPath: ctx.config.datasetPath, codes: codes.size });

  return runLogoDownloader({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    http: ctx.http,
    sink: ctx.sink,
    codes,
    baseUrl,
  });
}

export async function runPipeline(ctx: CommandContext, baseUrl: string): Promise<void> {
  ctx.logger.info("pipeline_start", { baseUrl });
  await runScrape(ctx);
  const summary = await runDownload(ctx, baseUrl);
  ctx.logger.info("pipeline_complete", { ...summary });
}
