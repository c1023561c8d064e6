import { AppConfig } from "../config";
import { errorMessage, NoTableError } from "../core/errors";
import { HttpClient } from "../core/http";
import { Logger, MetricsRegistry } from "../observability";
import { PageRef, RawTable, ScrapeResult } from "../types";
import { extractMarkedTable } from "./htmlParser";

interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  http: HttpClient;
}

export function buildPageRefs(config: AppConfig): PageRef[] {
  return config.pageSuffixes.map((suffix) => ({
    suffix,
    url: `${config.listBaseUrl}(${suffix})`,
  }));
}

async function fetchPageTable(deps: CrawlDependencies, page: PageRef): Promise<RawTable | undefined> {
  const html = await deps.http.getText(page.url);
  return extractMarkedTable(html, deps.config.markerColumn);
}

/**
 * Visits every list page one after another. A page that fails or has no
 * qualifying table contributes nothing; the header comes from the first page
 * that has one and is never replaced.
 */
export async function scrapeAirlinePages(deps: CrawlDependencies): Promise<ScrapeResult> {
  const { config, logger, metrics } = deps;
  let header: string[] | undefined;
  const rows: string[][] = [];
  let pagesVisited = 0;
  let pagesWithTable = 0;

  for (const page of buildPageRefs(config)) {
    pagesVisited += 1;
    logger.info("page_fetch_start", { url: page.url, suffix: page.suffix });
    const stopTimer = metrics.startTimer("page_fetch_ms");

    let table: RawTable | undefined;
    try {
      table = await fetchPageTable(deps, page);
    } catch (error) {
      metrics.incrementCounter("pages_failed", 1);
      logger.warn("page_fetch_failed", { url: page.url, durationMs: stopTimer(), error: errorMessage(error) });
      continue;
    }

    metrics.incrementCounter("pages_fetched", 1);
    const durationMs = stopTimer();
    if (!table) {
      metrics.incrementCounter("pages_without_table", 1);
      logger.warn("page_no_marked_table", { url: page.url, marker: config.markerColumn, durationMs });
      continue;
    }

    if (!header) {
      header = table.header;
    }
    rows.push(...table.rows);
    pagesWithTable += 1;
    metrics.incrementCounter("rows_extracted", table.rows.length);
    logger.info("page_fetch_complete", {
      url: page.url,
      rows: table.rows.length,
      columns: table.header.length,
      durationMs,
    });
  }

  if (!header) {
    throw new NoTableError(config.markerColumn);
  }

  logger.info("scrape_finished", { pagesVisited, pagesWithTable, rows: rows.length, columns: header.length });
  return { header, rows, pagesVisited, pagesWithTable };
}
