export interface CatalogEntry {
  identifier: string;
  remoteId: string;
  pmid: string;
  citation: string;
  license: string;
}

export type WorkItem = Readonly<{
  identifier: string;
  remoteId: string;
  artifactPath: string;
}>;

export type FetchStatus = "success" | "skipped_existing" | "failed";

export interface FetchOutcome {
  identifier: string;
  status: FetchStatus;
  detail?: string;
  lastError?: string;
  attempts: number;
  durationMs: number;
  finishedAt: string;
}

export interface ProgressRecord {
  downloaded: Set<string>;
  failed: Set<string>;
  lastUpdated?: string;
}

export interface FetchSummary {
  requested: number;
  dispatched: number;
  succeeded: number;
  skipped: number;
  failed: number;
  reconciled: number;
  downloadedTotal: number;
  failedTotal: number;
  checkpoints: number;
  cancelled: boolean;
}

export interface BodySection {
  title: string;
  text: string;
}

export interface CorpusRecord {
  identifier: string;
  title: string;
  abstract: string;
  keywords: string[];
  journal: string;
  sections: BodySection[];
  figureCaptions: string[];
  tableCaptions: string[];
  fullText: string;
  textLength: number;
}

export interface ExtractionResult {
  identifier: string;
  sourcePath: string;
  status: "extracted" | "skipped";
  reason?: string;
  textLength?: number;
  extractedAt: string;
}
