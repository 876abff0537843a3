import path from "node:path";
import { WorkItem } from "../types";

export const ARTIFACT_EXTENSION = ".xml";

export function artifactPathFor(artifactsDir: string, identifier: string): string {
  return path.join(artifactsDir, `${identifier}${ARTIFACT_EXTENSION}`);
}

export function toRemoteId(identifier: string, prefix: string): string {
  if (prefix && identifier.toUpperCase().startsWith(prefix.toUpperCase())) {
    return identifier.slice(prefix.length);
  }
  return identifier;
}

export function toWorkItem(identifier: string, artifactsDir: string, prefix = "PMC"): WorkItem {
  const trimmed = identifier.trim();
  return Object.freeze({
    identifier: trimmed,
    remoteId: toRemoteId(trimmed, prefix),
    artifactPath: artifactPathFor(artifactsDir, trimmed),
  });
}

/** Keeps the first occurrence of each identifier, in input order. */
export function toWorkItems(identifiers: Iterable<string>, artifactsDir: string, prefix = "PMC"): WorkItem[] {
  const seen = new Set<string>();
  const items: WorkItem[] = [];
  for (const identifier of identifiers) {
    const item = toWorkItem(identifier, artifactsDir, prefix);
    if (item.identifier.length === 0 || seen.has(item.identifier)) {
      continue;
    }
    seen.add(item.identifier);
    items.push(item);
  }
  return items;
}
