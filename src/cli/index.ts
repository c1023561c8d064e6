import { loadConfig } from "../config";
import { runDownload, runPipeline, runScrape } from "../core/commands";
import { MissingArgumentError } from "../core/errors";
import { createHttpClient, FetchFn } from "../core/http";
import { ensureTrailingSlash } from "../download/downloader";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";

export type CommandName = "run" | "scrape" | "download";

export interface ParsedCliArgs {
  command: CommandName;
  baseLogoUrl?: string;
  ignoreHttpsErrors: boolean;
  concurrency?: number;
  configPath?: string;
}

export interface CliOptions {
  fetchFn?: FetchFn;
  env?: NodeJS.ProcessEnv;
}

const HELP_TEXT = `
Usage:
  airline-codes [run] <base_logo_url>
  airline-codes scrape
  airline-codes download <base_logo_url>

Commands:
  run       Scrape the airline code lists, write the CSV, then download logos (default)
  scrape    Scrape the airline code lists and write the CSV only
  download  Download logos for the codes in an existing CSV

Options:
  --config <path>        Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --concurrency <n>      Maximum logo downloads in flight (default 12)
  -h, --help             Show this help

Example:
  airline-codes https://cdn.example.com/logos/
`;

const FLAGS_WITH_VALUE = new Set(["--config", "--concurrency"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "scrape" || raw === "download") {
    return raw;
  }
  return undefined;
}

function collectPositionals(argv: string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (FLAGS_WITH_VALUE.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith("-")) {
      continue;
    }
    positionals.push(arg);
  }
  return positionals;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const positionals = collectPositionals(argv);
  const explicit = parseCommand(positionals[0]);
  const command = explicit ?? "run";
  const baseLogoUrl = explicit ? positionals[1] : positionals[0];

  let configPath: string | undefined;
  const configIndex = argv.indexOf("--config");
  if (configIndex >= 0 && argv[configIndex + 1]) {
    configPath = argv[configIndex + 1];
  }

  const concurrencyIndex = argv.indexOf("--concurrency");
  const concurrencyRaw = concurrencyIndex >= 0 ? argv[concurrencyIndex + 1] : undefined;
  const concurrencyParsed = concurrencyRaw ? Number.parseInt(concurrencyRaw, 10) : undefined;

  return {
    command,
    baseLogoUrl: baseLogoUrl ? ensureTrailingSlash(baseLogoUrl) : undefined,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    concurrency:
      concurrencyParsed !== undefined && Number.isFinite(concurrencyParsed) ? Math.max(1, concurrencyParsed) : undefined,
    configPath,
  };
}

function requireBaseUrl(parsed: ParsedCliArgs): string {
  if (!parsed.baseLogoUrl) {
    throw new MissingArgumentError(`missing <base_logo_url>\n${HELP_TEXT.trim()}`);
  }
  return parsed.baseLogoUrl;
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  if (parsed.command !== "scrape") {
    requireBaseUrl(parsed);
  }

  let config = loadConfig(parsed.configPath, options.env);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  if (parsed.concurrency !== undefined) {
    config = {
      ...config,
      downloadConcurrency: parsed.concurrency,
    };
  }

  const runId = createRunId();
  const http = createHttpClient(config, { fetchFn: options.fetchFn });
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const context = { runId, config, logger, metrics, http, sink };

  logger.info("command_start", {
    command: parsed.command,
    baseLogoUrl: parsed.baseLogoUrl,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    downloadConcurrency: config.downloadConcurrency,
  });

  try {
    switch (parsed.command) {
      case "scrape":
        await runScrape({ ...context, logger: logger.child("scrape") });
        break;
      case "download":
        await runDownload({ ...context, logger: logger.child("download") }, requireBaseUrl(parsed));
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") }, requireBaseUrl(parsed));
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    await http.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
