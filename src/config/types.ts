import { LogThreshold } from "../observability/types";

export interface OutputDirs {
  artifacts: string;
  processed: string;
  manifests: string;
}

export type ProgressBackend = "json" | "sqlite";

export type CorpusFormat = "jsonl" | "txt" | "both";

export type SinkType = "local_jsonl" | "http" | "none";

export interface SinkConfig {
  type: SinkType;
  endpoint?: string;
  token?: string;
  batchSize?: number;
}

export interface AppConfig {
  apiBaseUrl: string;
  email: string;
  apiKey?: string;
  tool: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxRequestsPerSecond: number;
  fetchConcurrency: number;
  maxRetries: number;
  retryBackoffMs: number;
  checkpointEvery: number;
  minArtifactBytes: number;
  minResponseBytes: number;
  requireClosingTag: boolean;
  identifierPrefix: string;
  catalogPath: string;
  keywordsPath: string;
  selectionPath: string;
  progressPath: string;
  progressBackend: ProgressBackend;
  extractConcurrency: number;
  minBodyChars: number;
  corpusFormat: CorpusFormat;
  logLevel: LogThreshold;
  sink: SinkConfig;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "sink">> & {
  outputDirs?: Partial<OutputDirs>;
  sink?: Partial<SinkConfig>;
};
