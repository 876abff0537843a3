import fs from "node:fs";
import path from "node:path";
import { isMissingFileError } from "../core/errors";
import { ARTIFACT_EXTENSION } from "./workItems";

export interface ArtifactCriteria {
  minBytes: number;
  requireClosingTag: boolean;
}

const TAIL_BYTES = 256;
const CLOSING_TAG_AT_END = /<\/[A-Za-z_][\w.:-]*\s*>\s*$/;

async function readTail(filePath: string, size: number): Promise<string> {
  const length = Math.min(TAIL_BYTES, size);
  const handle = await fs.promises.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    await handle.read(buffer, 0, length, size - length);
    return buffer.toString("utf-8");
  } finally {
    await handle.close();
  }
}

/** True when the text ends with a closing element tag, ignoring trailing whitespace. */
export function endsWithClosingTag(content: Buffer | string): boolean {
  const text = typeof content === "string" ? content : content.subarray(-TAIL_BYTES).toString("utf-8");
  return CLOSING_TAG_AT_END.test(text);
}

/**
 * An artifact counts as complete when it is larger than `minBytes` and, if
 * required, its content ends with a closing element tag. Files cut off during
 * a write fail the second check.
 */
export async function isValidArtifact(filePath: string, criteria: ArtifactCriteria): Promise<boolean> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(filePath);
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }

  if (!stat.isFile() || stat.size <= criteria.minBytes) {
    return false;
  }
  if (!criteria.requireClosingTag) {
    return true;
  }
  return endsWithClosingTag(await readTail(filePath, stat.size));
}

/** Returns identifiers of every valid artifact in `dir`; a missing directory has none. */
export async function scanArtifacts(dir: string, criteria: ArtifactCriteria): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingFileError(error)) {
      return [];
    }
    throw error;
  }

  const identifiers: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.endsWith(ARTIFACT_EXTENSION)) {
      continue;
    }
    if (await isValidArtifact(path.join(dir, entry.name), criteria)) {
      identifiers.push(entry.name.slice(0, -ARTIFACT_EXTENSION.length));
    }
  }
  return identifiers.sort();
}

export async function writeArtifactAtomic(filePath: string, content: Buffer): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.part`;
  try {
    await fs.promises.writeFile(tempPath, content);
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}
