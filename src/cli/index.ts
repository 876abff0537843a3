import { AppConfig, CorpusFormat, loadConfig, withOutputBase } from "../config";
import { runExtract, runFetch, runPipeline, runSelect, runStatus } from "../core/commands";
import { ConfigError, errorMessage } from "../core/errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";

export type CommandName = "select" | "fetch" | "extract" | "run" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  csvPath?: string;
  idsPath?: string;
  maxResults?: number;
  resume: boolean;
  retryFailed: boolean;
  dryRun: boolean;
  workers?: number;
  format?: CorpusFormat;
  maxFiles?: number;
  outputDir?: string;
}

const HELP_TEXT = `
Usage:
  corpus-harvester <command> [options]

Commands:
  select    Filter the catalog CSV by keyword and save the selection
  fetch     Download every selected item (resumable)
  extract   Build the text corpus from downloaded items
  run       select, fetch and extract in sequence
  status    Report checkpoint and artifact counts

Options:
  --config <path>       Optional path to JSON config file
  --csv <path>          Catalog CSV to select from
  --ids <path>          Fetch the identifiers listed in a file instead of the selection
  --max-results <n>     Limit the number of selected or fetched items
  --resume              Reuse an existing selection
  --retry-failed        Retry identifiers recorded as failed
  --dry-run             Select without saving (select, run)
  --workers <n>         Number of concurrent fetch workers
  --format <fmt>        Corpus format: jsonl, txt or both
  --max-files <n>       Limit the number of files extracted
  --output-dir <path>   Write all generated files under this directory
  -h, --help            Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "select" || raw === "fetch" || raw === "extract" || raw === "run" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  const value = index >= 0 ? argv[index + 1] : undefined;
  return value && !value.startsWith("--") ? value : undefined;
}

function intOption(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isFinite(parsed) ? parsed : undefined;
}

function formatOption(argv: string[]): CorpusFormat | undefined {
  const raw = optionValue(argv, "--format");
  return raw === "jsonl" || raw === "txt" || raw === "both" ? raw : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    configPath: optionValue(argv, "--config"),
    csvPath: optionValue(argv, "--csv"),
    idsPath: optionValue(argv, "--ids"),
    maxResults: intOption(argv, "--max-results"),
    resume: argv.includes("--resume"),
    retryFailed: argv.includes("--retry-failed"),
    dryRun: argv.includes("--dry-run"),
    workers: intOption(argv, "--workers"),
    format: formatOption(argv),
    maxFiles: intOption(argv, "--max-files"),
    outputDir: optionValue(argv, "--output-dir"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  let next = parsed.outputDir ? withOutputBase(config, parsed.outputDir) : config;
  if (parsed.csvPath) {
    next = { ...next, catalogPath: parsed.csvPath };
  }
  if (parsed.workers !== undefined) {
    next = { ...next, fetchConcurrency: parsed.workers };
  }
  if (parsed.format) {
    next = { ...next, corpusFormat: parsed.format };
  }
  return next;
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId(new Date(), parsed.command);
  const bootLogger = new Logger({ component: "cli", runId });
  let config: AppConfig;
  try {
    config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  } catch (error) {
    bootLogger.error("config_invalid", { error: errorMessage(error) });
    return 1;
  }

  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const metrics = new MetricsRegistry();
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("shutdown_requested", { signal });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const context = { runId, config, logger, metrics, sink: createSink(config, runId), signal: controller.signal };

  logger.info("command_start", {
    command: parsed.command,
    maxResults: parsed.maxResults,
    resume: parsed.resume,
    retryFailed: parsed.retryFailed,
    dryRun: parsed.dryRun,
    workers: config.fetchConcurrency,
  });

  try {
    switch (parsed.command) {
      case "select":
        await runSelect(
          { ...context, logger: logger.child("select") },
          { resume: parsed.resume, dryRun: parsed.dryRun, maxResults: parsed.maxResults },
        );
        break;
      case "fetch":
        await runFetch(
          { ...context, logger: logger.child("fetch") },
          { idsPath: parsed.idsPath, maxResults: parsed.maxResults, retryFailed: parsed.retryFailed },
        );
        break;
      case "extract":
        await runExtract({ ...context, logger: logger.child("extract") }, { maxFiles: parsed.maxFiles });
        break;
      case "run":
        await runPipeline(
          { ...context, logger: logger.child("pipeline") },
          {
            resume: parsed.resume,
            dryRun: parsed.dryRun,
            maxResults: parsed.maxResults,
            retryFailed: parsed.retryFailed,
            maxFiles: parsed.maxFiles,
          },
        );
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("command_failed", { command: parsed.command, error: error.message });
      return 1;
    }
    throw error;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    metrics.logSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
