import fs from "node:fs";
import path from "node:path";
import { CorpusRecord } from "../types";

export const CORPUS_JSONL_FILE = "corpus.jsonl";
export const CORPUS_TEXT_FILE = "corpus.txt";
export const CORPUS_STATS_FILE = "corpus_stats.json";

export const TEXT_RECORD_SEPARATOR = `\n\n${"=".repeat(40)}\n\n`;

export interface CorpusStats {
  totalArticles: number;
  skippedArticles: number;
  totalCharacters: number;
  avgCharacters: number;
  estimatedTokens: number;
}

export function computeStats(records: readonly CorpusRecord[], skipped: number): CorpusStats {
  const totalCharacters = records.reduce((total, record) => total + record.textLength, 0);
  return {
    totalArticles: records.length,
    skippedArticles: skipped,
    totalCharacters,
    avgCharacters: records.length > 0 ? Math.floor(totalCharacters / records.length) : 0,
    // Rough estimate at four characters per token.
    estimatedTokens: Math.floor(totalCharacters / 4),
  };
}

async function writeChunks(filePath: string, chunks: Iterable<string>): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  const handle = await fs.promises.open(tempPath, "w");
  try {
    for (const chunk of chunks) {
      await handle.write(chunk);
    }
  } finally {
    await handle.close();
  }
  await fs.promises.rename(tempPath, filePath);
}

function* jsonlLines(records: readonly CorpusRecord[]): Generator<string> {
  for (const record of records) {
    yield `${JSON.stringify({
      identifier: record.identifier,
      title: record.title,
      abstract: record.abstract,
      keywords: record.keywords,
      journal: record.journal,
      text: record.fullText,
    })}\n`;
  }
}

function* textBlocks(records: readonly CorpusRecord[]): Generator<string> {
  for (const record of records) {
    yield record.fullText;
    yield TEXT_RECORD_SEPARATOR;
  }
}

export async function writeCorpusJsonl(filePath: string, records: readonly CorpusRecord[]): Promise<void> {
  await writeChunks(filePath, jsonlLines(records));
}

export async function writeCorpusText(filePath: string, records: readonly CorpusRecord[]): Promise<void> {
  await writeChunks(filePath, textBlocks(records));
}

export async function writeCorpusStats(filePath: string, stats: CorpusStats): Promise<void> {
  await writeChunks(filePath, [`${JSON.stringify(stats, null, 2)}\n`]);
}
