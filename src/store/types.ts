import { ProgressRecord } from "../types";

/** Durable checkpoint of which identifiers are done and which have failed. */
export interface ProgressStore {
  /** Never rejects for a missing or unreadable checkpoint; returns an empty record instead. */
  load(): Promise<ProgressRecord>;
  /** Replaces the checkpoint atomically. */
  save(record: ProgressRecord): Promise<void>;
  close(): Promise<void>;
}

export interface SerializedProgress {
  downloaded: string[];
  failed: string[];
  last_updated: string;
}

export function emptyProgress(): ProgressRecord {
  return { downloaded: new Set(), failed: new Set() };
}

/** Sorted arrays with every identifier in at most one list; downloaded wins. */
export function serializeProgress(record: ProgressRecord, now = new Date()): SerializedProgress {
  return {
    downloaded: [...record.downloaded].sort(),
    failed: [...record.failed].filter((identifier) => !record.downloaded.has(identifier)).sort(),
    last_updated: now.toISOString(),
  };
}

function stringsOf(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === "string" && entry.length > 0);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Accepts any parsed JSON; unknown fields are ignored. */
export function deserializeProgress(value: unknown): ProgressRecord | undefined {
  if (!isPlainObject(value)) {
    return undefined;
  }

  const downloaded = new Set(stringsOf(value.downloaded));
  const failed = new Set(stringsOf(value.failed).filter((identifier) => !downloaded.has(identifier)));
  const lastUpdated = value.last_updated;
  return {
    downloaded,
    failed,
    lastUpdated: typeof lastUpdated === "string" ? lastUpdated : undefined,
  };
}
