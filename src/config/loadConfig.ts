import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { parseLogThreshold } from "../observability/logger";
import { AppConfig, ConfigOverrides, CorpusFormat, ProgressBackend, SinkType } from "./types";

const PLACEHOLDER_EMAILS = new Set(["", "your_email_here", "your_email@example.com"]);

const DEFAULT_CONFIG: AppConfig = {
  apiBaseUrl: "https://eutils.ncbi.nlm.nih.gov/entrez/eutils",
  email: "",
  apiKey: undefined,
  tool: "corpus-harvester",
  userAgent: "corpus-harvester/0.1",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 60_000,
  maxRequestsPerSecond: 3,
  fetchConcurrency: 8,
  maxRetries: 3,
  retryBackoffMs: 1_000,
  checkpointEvery: 500,
  minArtifactBytes: 100,
  minResponseBytes: 200,
  requireClosingTag: true,
  identifierPrefix: "PMC",
  catalogPath: "data/oa_file_list.csv",
  keywordsPath: path.resolve(__dirname, "../../resources/catalog-keywords.json"),
  selectionPath: "data/selected_articles.json",
  progressPath: "data/download_progress.json",
  progressBackend: "json",
  extractConcurrency: 4,
  minBodyChars: 500,
  corpusFormat: "both",
  logLevel: "info",
  sink: {
    type: "local_jsonl",
  },
  outputDirs: {
    artifacts: "data/xml",
    processed: "data/processed",
    manifests: "data/manifests",
  },
};

const RATE_WITH_API_KEY = 9;
const RATE_WITHOUT_API_KEY = 3;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toProgressBackend(value: string | undefined, fallback: ProgressBackend): ProgressBackend {
  return value === "json" || value === "sqlite" ? value : fallback;
}

function toCorpusFormat(value: string | undefined, fallback: CorpusFormat): CorpusFormat {
  return value === "jsonl" || value === "txt" || value === "both" ? value : fallback;
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  return value === "local_jsonl" || value === "http" || value === "none" ? value : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    sink: {
      ...DEFAULT_CONFIG.sink,
      ...(fileConfig.sink ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  const apiKey = env.ENTREZ_API_KEY ?? merged.apiKey;
  const explicitRate = env.MAX_REQUESTS_PER_SECOND ?? fileConfig.maxRequestsPerSecond;
  const defaultRate = apiKey ? RATE_WITH_API_KEY : RATE_WITHOUT_API_KEY;

  return {
    ...merged,
    apiBaseUrl: env.ENTREZ_BASE_URL ?? merged.apiBaseUrl,
    email: env.ENTREZ_EMAIL ?? merged.email,
    apiKey: apiKey || undefined,
    tool: env.ENTREZ_TOOL ?? merged.tool,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxRequestsPerSecond:
      explicitRate === undefined ? defaultRate : toFloat(env.MAX_REQUESTS_PER_SECOND, merged.maxRequestsPerSecond),
    fetchConcurrency: toInt(env.FETCH_CONCURRENCY, merged.fetchConcurrency),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    retryBackoffMs: toInt(env.RETRY_BACKOFF_MS, merged.retryBackoffMs),
    checkpointEvery: toInt(env.CHECKPOINT_EVERY, merged.checkpointEvery),
    minArtifactBytes: toInt(env.MIN_ARTIFACT_BYTES, merged.minArtifactBytes),
    minResponseBytes: toInt(env.MIN_RESPONSE_BYTES, merged.minResponseBytes),
    requireClosingTag: toBool(env.REQUIRE_CLOSING_TAG, merged.requireClosingTag),
    catalogPath: env.CATALOG_PATH ?? merged.catalogPath,
    keywordsPath: env.KEYWORDS_PATH ?? merged.keywordsPath,
    selectionPath: env.SELECTION_PATH ?? merged.selectionPath,
    progressPath: env.PROGRESS_PATH ?? merged.progressPath,
    progressBackend: toProgressBackend(env.PROGRESS_BACKEND, merged.progressBackend),
    extractConcurrency: toInt(env.EXTRACT_CONCURRENCY, merged.extractConcurrency),
    minBodyChars: toInt(env.MIN_BODY_CHARS, merged.minBodyChars),
    corpusFormat: toCorpusFormat(env.CORPUS_FORMAT, merged.corpusFormat),
    logLevel: parseLogThreshold(env.LOG_LEVEL, merged.logLevel),
    sink: {
      type: toSinkType(env.SINK_TYPE, merged.sink.type),
      endpoint: env.HTTP_SINK_ENDPOINT ?? merged.sink.endpoint,
      token: env.HTTP_SINK_TOKEN ?? merged.sink.token,
      batchSize: env.HTTP_SINK_BATCH_SIZE ? toInt(env.HTTP_SINK_BATCH_SIZE, 50) : merged.sink.batchSize,
    },
    outputDirs: {
      artifacts: env.OUTPUT_ARTIFACTS_DIR ?? merged.outputDirs.artifacts,
      processed: env.OUTPUT_PROCESSED_DIR ?? merged.outputDirs.processed,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  };
}

/** Re-roots every generated path under `baseDir`; input paths are left alone. */
export function withOutputBase(config: AppConfig, baseDir: string): AppConfig {
  return {
    ...config,
    selectionPath: path.join(baseDir, path.basename(config.selectionPath)),
    progressPath: path.join(baseDir, path.basename(config.progressPath)),
    outputDirs: {
      artifacts: path.join(baseDir, path.basename(config.outputDirs.artifacts)),
      processed: path.join(baseDir, path.basename(config.outputDirs.processed)),
      manifests: path.join(baseDir, path.basename(config.outputDirs.manifests)),
    },
  };
}

export function validateFetchConfig(config: AppConfig): void {
  if (PLACEHOLDER_EMAILS.has(config.email.trim().toLowerCase())) {
    throw new ConfigError("A contact email is required by the remote API (set ENTREZ_EMAIL or \"email\" in the config file)");
  }
  if (config.fetchConcurrency < 1) {
    throw new ConfigError(`fetchConcurrency must be at least 1, got ${config.fetchConcurrency}`);
  }
  if (config.maxRetries < 1) {
    throw new ConfigError(`maxRetries must be at least 1, got ${config.maxRetries}`);
  }
  if (config.checkpointEvery < 1) {
    throw new ConfigError(`checkpointEvery must be at least 1, got ${config.checkpointEvery}`);
  }
  if (!(config.maxRequestsPerSecond > 0)) {
    throw new ConfigError(`maxRequestsPerSecond must be positive, got ${config.maxRequestsPerSecond}`);
  }
}

export { DEFAULT_CONFIG };
