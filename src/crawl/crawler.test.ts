import { Response } from "undici";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { NoTableError } from "../core/errors";
import { createHttpClient, HttpClient } from "../core/http";
import { Logger, MetricsRegistry } from "../observability";
import { createFakeFetch, FakeRoute, htmlResponse, page, wikitable } from "../testing/fakeHttp";
import { buildPageRefs, scrapeAirlinePages } from "./crawler";

const config: AppConfig = {
  ...DEFAULT_CONFIG,
  listBaseUrl: "https://wiki.test/List_",
  pageSuffixes: ["0%E2%80%939", "A", "B", "C", "D"],
};

const ROUTES: Record<string, () => Response> = {
  "https://wiki.test/List_(0%E2%80%939)": () => htmlResponse("oops", 500),
  "https://wiki.test/List_(A)": () =>
    htmlResponse(page(wikitable(["IATA", "ICAO", "Airline"], [["AA", "AAL", "American"], ["AB", "BER"]]))),
  "https://wiki.test/List_(B)": () => {
    throw new Error("connect ECONNREFUSED");
  },
  "https://wiki.test/List_(C)": () => htmlResponse(page(wikitable(["Code", "Name"], [["x", "y"]]))),
  "https://wiki.test/List_(D)": () =>
    htmlResponse(page(wikitable(["IATA", "Airline"], [["DL", "Delta"], ["DX", "Danish Air", "extra", "cells"]]))),
};

describe("buildPageRefs", () => {
  test("appends each suffix in parentheses", () => {
    expect(buildPageRefs(config).map((ref) => ref.url)).toEqual([
      "https://wiki.test/List_(0%E2%80%939)",
      "https://wiki.test/List_(A)",
      "https://wiki.test/List_(B)",
      "https://wiki.test/List_(C)",
      "https://wiki.test/List_(D)",
    ]);
  });

  test("default configuration covers the digits page plus A to Z", () => {
    const refs = buildPageRefs(DEFAULT_CONFIG);
    expect(refs).toHaveLength(27);
    expect(refs[0].url).toBe("https://en.wikipedia.org/wiki/List_of_airline_codes_(0%E2%80%939)");
    expect(refs[26].suffix).toBe("Z");
  });
});

describe("scrapeAirlinePages", () => {
  let http: HttpClient;
  let metrics: MetricsRegistry;
  const logger = new Logger({ component: "crawl", runId: "run_test" });

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    metrics = new MetricsRegistry();
  });

  afterEach(async () => {
    await http.close();
    jest.restoreAllMocks();
  });

  function useRoutes(route: FakeRoute) {
    const fake = createFakeFetch(route);
    http = createHttpClient(config, { fetchFn: fake.fetchFn });
    return fake;
  }

  test("keeps the first header and skips failing or unmarked pages", async () => {
    useRoutes((url) => ROUTES[url]());

    const result = await scrapeAirlinePages({ config, logger, metrics, http });

    expect(result.header).toEqual(["IATA", "ICAO", "Airline"]);
    expect(result.rows).toEqual([
      ["AA", "AAL", "American"],
      ["AB", "BER"],
      ["DL", "Delta"],
      ["DX", "Danish Air", "extra", "cells"],
    ]);
    expect(result.pagesVisited).toBe(5);
    expect(result.pagesWithTable).toBe(2);
    expect(metrics.getCounters()).toMatchObject({
      pages_fetched: 3,
      pages_failed: 2,
      pages_without_table: 1,
      rows_extracted: 4,
    });
  });

  test("fetches pages one at a time in suffix order", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fake = useRoutes(async (url) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 2));
      inFlight -= 1;
      return htmlResponse(page(wikitable(["IATA"], [[url.slice(-2, -1)]])));
    });

    const result = await scrapeAirlinePages({ config, logger, metrics, http });

    expect(maxInFlight).toBe(1);
    expect(fake.requests.map((request) => request.url)).toEqual(buildPageRefs(config).map((ref) => ref.url));
    expect(result.rows).toEqual([["9"], ["A"], ["B"], ["C"], ["D"]]);
  });

  test("sends the configured user agent", async () => {
    const fake = useRoutes(() => htmlResponse(page(wikitable(["IATA"], [["AA"]]))));

    await scrapeAirlinePages({ config, logger, metrics, http });

    expect(fake.requests[0].init.headers["user-agent"]).toBe(DEFAULT_CONFIG.userAgent);
  });

  test("fails when no page yields a marked table", async () => {
    useRoutes(() => htmlResponse(page(wikitable(["ICAO"], [["AAL"]]))));

    await expect(scrapeAirlinePages({ config, logger, metrics, http })).rejects.toBeInstanceOf(NoTableError);
  });
});
