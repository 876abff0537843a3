import fs from "node:fs";
import path from "node:path";
import { ConfigError, isMissingFileError } from "../core/errors";
import { CatalogEntry } from "../types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toCatalogEntry(value: unknown): CatalogEntry | undefined {
  if (!isRecord(value) || typeof value.identifier !== "string" || typeof value.remoteId !== "string") {
    return undefined;
  }
  return {
    identifier: value.identifier,
    remoteId: value.remoteId,
    pmid: text(value.pmid),
    citation: text(value.citation),
    license: text(value.license),
  };
}

export async function saveSelection(filePath: string, entries: CatalogEntry[]): Promise<void> {
  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, JSON.stringify(entries), "utf-8");
  await fs.promises.rename(tempPath, filePath);
}

/** Returns `undefined` when no selection has been saved yet. */
export async function loadSelection(filePath: string): Promise<CatalogEntry[] | undefined> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Selection file is not valid JSON: ${filePath}`);
  }
  if (!Array.isArray(parsed)) {
    throw new ConfigError(`Selection file must contain a JSON array: ${filePath}`);
  }
  const entries: CatalogEntry[] = [];
  for (const value of parsed) {
    const entry = toCatalogEntry(value);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}

/** One identifier per line; blank lines and `#` comments are skipped. */
export async function readIdentifierList(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigError(`Identifier list not found: ${filePath}`);
    }
    throw error;
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function loadKeywords(filePath: string): Promise<string[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(filePath, "utf-8"));
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigError(`Keyword list not found: ${filePath}`);
    }
    throw new ConfigError(`Keyword list is not valid JSON: ${filePath}`);
  }
  if (!Array.isArray(parsed)) {
    throw new ConfigError(`Keyword list must be a JSON array of strings: ${filePath}`);
  }
  return parsed.filter((keyword): keyword is string => typeof keyword === "string" && keyword.trim().length > 0);
}
