import { filterCatalog, loadKeywords, loadSelection, readIdentifierList, saveSelection } from "../catalog";
import { AppConfig, CorpusFormat, validateFetchConfig } from "../config";
import {
  ArtifactCriteria,
  EntrezRemoteSource,
  FetchCoordinator,
  FetchWorker,
  RateLimiter,
  RemoteSource,
  scanArtifacts,
  toWorkItems,
} from "../download";
import { ExtractionSummary, JatsExtractor, runExtractor } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { createProgressStore } from "../store";
import { CatalogEntry, FetchSummary } from "../types";
import { ConfigError } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  signal?: AbortSignal;
  /** Replaces the configured remote API, mainly for tests. */
  source?: RemoteSource;
}

export interface SelectOptions {
  resume?: boolean;
  dryRun?: boolean;
  maxResults?: number;
}

export interface FetchOptions {
  idsPath?: string;
  entries?: CatalogEntry[];
  maxResults?: number;
  retryFailed?: boolean;
}

export interface ExtractOptions {
  format?: CorpusFormat;
  maxFiles?: number;
}

export type PipelineOptions = SelectOptions & Omit<FetchOptions, "entries" | "idsPath"> & ExtractOptions;

export interface StatusReport {
  downloaded: number;
  failed: number;
  artifacts: number;
  untracked: number;
  lastUpdated?: string;
}

function artifactCriteria(config: AppConfig): ArtifactCriteria {
  return { minBytes: config.minArtifactBytes, requireClosingTag: config.requireClosingTag };
}

export async function runSelect(ctx: CommandContext, options: SelectOptions = {}): Promise<CatalogEntry[]> {
  const { config, logger } = ctx;

  if (options.resume) {
    const existing = await loadSelection(config.selectionPath);
    if (existing) {
      logger.info("select_resumed", { path: config.selectionPath, count: existing.length });
      return existing;
    }
  }

  const keywords = await loadKeywords(config.keywordsPath);
  logger.info("select_start", { path: config.catalogPath, keywords: keywords.length, maxResults: options.maxResults });
  const result = await filterCatalog({
    csvPath: config.catalogPath,
    keywords,
    identifierPrefix: config.identifierPrefix,
    maxArticles: options.maxResults,
    logger,
    metrics: ctx.metrics,
  });

  if (options.dryRun) {
    logger.info("select_dry_run", { scanned: result.scanned, selected: result.entries.length });
    return result.entries;
  }

  await saveSelection(config.selectionPath, result.entries);
  logger.info("select_complete", { scanned: result.scanned, selected: result.entries.length, path: config.selectionPath });
  return result.entries;
}

async function resolveIdentifiers(ctx: CommandContext, options: FetchOptions): Promise<string[]> {
  if (options.idsPath) {
    return readIdentifierList(options.idsPath);
  }
  if (options.entries) {
    return options.entries.map((entry) => entry.identifier);
  }
  const selection = await loadSelection(ctx.config.selectionPath);
  if (!selection) {
    throw new ConfigError(`No selection found at ${ctx.config.selectionPath}; run "select" first or pass --ids`);
  }
  return selection.map((entry) => entry.identifier);
}

export async function runFetch(ctx: CommandContext, options: FetchOptions = {}): Promise<FetchSummary> {
  const { config, logger, metrics } = ctx;
  validateFetchConfig(config);

  const identifiers = await resolveIdentifiers(ctx, options);
  const limited = options.maxResults !== undefined ? identifiers.slice(0, Math.max(0, options.maxResults)) : identifiers;
  const items = toWorkItems(limited, config.outputDirs.artifacts, config.identifierPrefix);
  const artifact = artifactCriteria(config);

  const rateLimiter = RateLimiter.fromRate(config.maxRequestsPerSecond);
  logger.info("fetch_start", {
    items: items.length,
    workers: config.fetchConcurrency,
    intervalMs: Number(rateLimiter.intervalMs.toFixed(1)),
    retryFailed: options.retryFailed ?? false,
  });

  const worker = new FetchWorker({
    source: ctx.source ?? EntrezRemoteSource.fromConfig(config),
    rateLimiter,
    logger: logger.child("fetch_worker"),
    metrics,
    options: {
      maxRetries: config.maxRetries,
      retryBackoffMs: config.retryBackoffMs,
      minResponseBytes: config.minResponseBytes,
      artifact,
    },
  });

  const store = createProgressStore(config, logger.child("progress"));
  try {
    const coordinator = new FetchCoordinator({
      worker,
      store,
      sink: ctx.sink,
      logger,
      metrics,
      options: {
        artifactsDir: config.outputDirs.artifacts,
        concurrency: config.fetchConcurrency,
        checkpointEvery: config.checkpointEvery,
        artifact,
      },
    });
    return await coordinator.run(items, { signal: ctx.signal, retryFailed: options.retryFailed });
  } finally {
    await store.close();
  }
}

export async function runExtract(ctx: CommandContext, options: ExtractOptions = {}): Promise<ExtractionSummary> {
  const { config } = ctx;
  return runExtractor({
    inputDir: config.outputDirs.artifacts,
    outputDir: config.outputDirs.processed,
    format: options.format ?? config.corpusFormat,
    concurrency: config.extractConcurrency,
    maxFiles: options.maxFiles,
    artifact: artifactCriteria(config),
    extractor: new JatsExtractor({ minBodyChars: config.minBodyChars }),
    logger: ctx.logger,
    metrics: ctx.metrics,
    sink: ctx.sink,
  });
}

export async function runPipeline(ctx: CommandContext, options: PipelineOptions = {}): Promise<void> {
  ctx.logger.info("pipeline_start", { maxResults: options.maxResults, resume: options.resume ?? false });

  const entries = await runSelect({ ...ctx, logger: ctx.logger.child("select") }, options);
  if (options.dryRun) {
    ctx.logger.info("pipeline_dry_run_complete", { selected: entries.length });
    return;
  }

  const fetchSummary = await runFetch(
    { ...ctx, logger: ctx.logger.child("fetch") },
    { entries, maxResults: options.maxResults, retryFailed: options.retryFailed },
  );
  if (fetchSummary.cancelled) {
    ctx.logger.warn("pipeline_stopped_after_fetch", { ...fetchSummary });
    return;
  }

  const extractSummary = await runExtract({ ...ctx, logger: ctx.logger.child("extract") }, options);
  ctx.logger.info("pipeline_complete", {
    downloadedTotal: fetchSummary.downloadedTotal,
    failedTotal: fetchSummary.failedTotal,
    extracted: extractSummary.extracted,
  });
}

export async function runStatus(ctx: CommandContext): Promise<StatusReport> {
  const { config, logger } = ctx;
  const store = createProgressStore(config, logger.child("progress"));
  try {
    const progress = await store.load();
    const artifacts = await scanArtifacts(config.outputDirs.artifacts, artifactCriteria(config));
    const report: StatusReport = {
      downloaded: progress.downloaded.size,
      failed: progress.failed.size,
      artifacts: artifacts.length,
      untracked: artifacts.filter((identifier) => !progress.downloaded.has(identifier)).length,
      lastUpdated: progress.lastUpdated,
    };
    logger.info("status_complete", { ...report });
    return report;
  } finally {
    await store.close();
  }
}
