import fs from "node:fs";
import { parse } from "csv-parse";
import { ConfigError, isMissingFileError } from "../core/errors";
import { toRemoteId } from "../download/workItems";
import { Logger, MetricsRegistry } from "../observability";
import { CatalogEntry } from "../types";

export interface CatalogFilterOptions {
  csvPath: string;
  keywords: readonly string[];
  identifierPrefix: string;
  maxArticles?: number;
  logger: Logger;
  metrics?: MetricsRegistry;
}

export interface CatalogFilterResult {
  scanned: number;
  entries: CatalogEntry[];
}

const COLUMN_ACCESSION = "Accession ID";
const COLUMN_CITATION = "Article Citation";
const COLUMN_PMID = "PMID";
const COLUMN_LICENSE = "License";

function column(row: Record<string, unknown>, name: string): string {
  const value = row[name];
  return typeof value === "string" ? value.trim() : "";
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createKeywordMatcher(keywords: readonly string[]): (citation: string) => boolean {
  const needles = keywords.map((keyword) => keyword.trim().toLowerCase()).filter((keyword) => keyword.length > 0);
  return (citation) => {
    const haystack = citation.toLowerCase();
    return needles.some((needle) => haystack.includes(needle));
  };
}

/**
 * Streams the open-access file list and keeps rows whose citation mentions
 * one of the keywords. Rows without an accession identifier are ignored.
 */
export async function filterCatalog(options: CatalogFilterOptions): Promise<CatalogFilterResult> {
  const { csvPath, logger } = options;
  const matches = createKeywordMatcher(options.keywords);
  const entries: CatalogEntry[] = [];
  let scanned = 0;

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(csvPath);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigError(`Catalog file not found: ${csvPath}`);
    }
    throw error;
  }
  if (!stat.isFile()) {
    throw new ConfigError(`Catalog path is not a file: ${csvPath}`);
  }

  logger.info("catalog_scan_start", { path: csvPath, keywords: options.keywords.length });
  const input = fs.createReadStream(csvPath, { encoding: "utf-8" });
  const parser = input.pipe(
    parse({
      columns: true,
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    }),
  );
  // pipe() does not carry read errors downstream.
  input.once("error", (error) => parser.destroy(error));

  try {
    for await (const record of parser) {
      const row: unknown = record;
      if (!isRow(row)) {
        continue;
      }
      scanned += 1;

      const identifier = column(row, COLUMN_ACCESSION);
      const citation = column(row, COLUMN_CITATION);
      if (!identifier || !matches(citation)) {
        continue;
      }

      entries.push({
        identifier,
        remoteId: toRemoteId(identifier, options.identifierPrefix),
        pmid: column(row, COLUMN_PMID),
        citation,
        license: column(row, COLUMN_LICENSE),
      });

      if (options.maxArticles !== undefined && entries.length >= options.maxArticles) {
        break;
      }
    }
  } finally {
    input.destroy();
  }

  options.metrics?.incrementCounter("items_selected", entries.length);
  logger.info("catalog_scan_complete", { scanned, selected: entries.length });
  return { scanned, entries };
}
