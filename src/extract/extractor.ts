import fs from "node:fs";
import path from "node:path";
import { CorpusFormat } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { errorMessage } from "../core/errors";
import { ArtifactCriteria, artifactPathFor, scanArtifacts } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { CorpusRecord, ExtractionResult } from "../types";
import {
  CORPUS_JSONL_FILE,
  CORPUS_STATS_FILE,
  CORPUS_TEXT_FILE,
  CorpusStats,
  computeStats,
  writeCorpusJsonl,
  writeCorpusStats,
  writeCorpusText,
} from "./corpusWriter";
import { MarkupExtractor } from "./markupExtractor";

interface ExtractorDeps {
  inputDir: string;
  outputDir: string;
  format: CorpusFormat;
  concurrency: number;
  artifact: ArtifactCriteria;
  extractor: MarkupExtractor;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  maxFiles?: number;
}

export interface ExtractionSummary {
  processed: number;
  extracted: number;
  skipped: number;
  stats: CorpusStats;
  outputs: string[];
}

function compareIdentifiers(a: CorpusRecord, b: CorpusRecord): number {
  if (a.identifier < b.identifier) {
    return -1;
  }
  return a.identifier > b.identifier ? 1 : 0;
}

export async function runExtractor(deps: ExtractorDeps): Promise<ExtractionSummary> {
  const { logger, metrics, extractor } = deps;
  const available = await scanArtifacts(deps.inputDir, deps.artifact);
  const identifiers = deps.maxFiles !== undefined ? available.slice(0, Math.max(0, deps.maxFiles)) : available;

  if (identifiers.length === 0) {
    logger.error("extract_no_artifacts", { path: deps.inputDir });
    return { processed: 0, extracted: 0, skipped: 0, stats: computeStats([], 0), outputs: [] };
  }
  logger.info("extract_start", { files: identifiers.length, path: deps.inputDir });

  const records: CorpusRecord[] = [];
  const results: ExtractionResult[] = [];

  await processWithConcurrency(identifiers, deps.concurrency, async (identifier) => {
    const sourcePath = artifactPathFor(deps.inputDir, identifier);
    const stopTimer = metrics.startTimer("extract_ms");
    let record: CorpusRecord | undefined;
    let reason = "below minimum content";
    try {
      const markup = await fs.promises.readFile(sourcePath, "utf-8");
      record = extractor.extract(markup, identifier);
    } catch (error) {
      reason = errorMessage(error);
      logger.debug("extract_item_error", { identifier, path: sourcePath, error: reason });
    }
    stopTimer();

    const extractedAt = new Date().toISOString();
    if (record) {
      records.push(record);
      metrics.incrementCounter("extract_ok");
      results.push({ identifier, sourcePath, status: "extracted", textLength: record.textLength, extractedAt });
    } else {
      metrics.incrementCounter("extract_skipped");
      results.push({ identifier, sourcePath, status: "skipped", reason, extractedAt });
    }
  });

  records.sort(compareIdentifiers);
  const skipped = identifiers.length - records.length;
  const stats = computeStats(records, skipped);
  const outputs: string[] = [];

  if (records.length === 0) {
    logger.error("extract_no_records", { path: deps.inputDir, skipped });
  } else {
    if (deps.format === "jsonl" || deps.format === "both") {
      const target = path.join(deps.outputDir, CORPUS_JSONL_FILE);
      await writeCorpusJsonl(target, records);
      outputs.push(target);
    }
    if (deps.format === "txt" || deps.format === "both") {
      const target = path.join(deps.outputDir, CORPUS_TEXT_FILE);
      await writeCorpusText(target, records);
      outputs.push(target);
    }
    const statsPath = path.join(deps.outputDir, CORPUS_STATS_FILE);
    await writeCorpusStats(statsPath, stats);
    outputs.push(statsPath);
  }

  try {
    await deps.sink.publishExtractionResults(results);
    await deps.sink.flush();
  } catch (error) {
    logger.warn("sink_publish_failed", { error: errorMessage(error) });
  }

  logger.info("extract_complete", { extracted: records.length, skipped, totalCharacters: stats.totalCharacters });
  return { processed: identifiers.length, extracted: records.length, skipped, stats, outputs };
}
