import { sleep } from "../core/concurrency";
import { errorMessage, PermanentRemoteError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { FetchOutcome, FetchStatus, WorkItem } from "../types";
import { ArtifactCriteria, endsWithClosingTag, isValidArtifact, writeArtifactAtomic } from "./artifacts";
import { RateLimiter } from "./rateLimiter";
import { RemoteSource } from "./remoteSource";

export interface FetchWorkerOptions {
  maxRetries: number;
  retryBackoffMs: number;
  minResponseBytes: number;
  artifact: ArtifactCriteria;
}

export interface FetchWorkerDeps {
  source: RemoteSource;
  rateLimiter: RateLimiter;
  logger: Logger;
  metrics: MetricsRegistry;
  options: FetchWorkerOptions;
  sleep?: (ms: number) => Promise<void>;
}

export const DETAIL_ALREADY_EXISTS = "already exists";
export const DETAIL_NOT_AVAILABLE = "item not available";
export const DETAIL_EMPTY_RESPONSE = "empty response";
export const DETAIL_MAX_RETRIES = "max retries exceeded";
export const DETAIL_TRUNCATED = "truncated response";

const ERROR_SNIFF_BYTES = 500;

function hasErrorMarker(body: Buffer): boolean {
  const head = body.subarray(0, ERROR_SNIFF_BYTES).toString("utf-8").toLowerCase();
  return head.includes("<error>") || head.includes("id not found");
}

/**
 * Retrieves one item with the retry policy. Every call settles with an
 * outcome; nothing thrown by the source or the filesystem escapes.
 */
export class FetchWorker {
  private readonly deps: FetchWorkerDeps;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: FetchWorkerDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? sleep;
  }

  async fetch(item: WorkItem): Promise<FetchOutcome> {
    const stopTimer = this.deps.metrics.startTimer("fetch_ms");
    let result: Omit<FetchOutcome, "identifier" | "durationMs" | "finishedAt">;
    try {
      result = await this.fetchWithRetry(item);
    } catch (error) {
      result = { status: "failed", detail: errorMessage(error), attempts: 0 };
    }
    return {
      identifier: item.identifier,
      ...result,
      durationMs: stopTimer(),
      finishedAt: new Date().toISOString(),
    };
  }

  private async fetchWithRetry(
    item: WorkItem,
  ): Promise<{ status: FetchStatus; detail?: string; lastError?: string; attempts: number }> {
    const { source, rateLimiter, metrics, options } = this.deps;
    const logger = this.deps.logger.with({ identifier: item.identifier });

    if (await isValidArtifact(item.artifactPath, options.artifact)) {
      return { status: "skipped_existing", detail: DETAIL_ALREADY_EXISTS, attempts: 0 };
    }

    let lastError: string | undefined;
    for (let attempt = 1; attempt <= options.maxRetries; attempt += 1) {
      const isLastAttempt = attempt >= options.maxRetries;
      if (attempt > 1) {
        metrics.incrementCounter("fetch_retries", 1);
      }

      await rateLimiter.wait();
      let body: Buffer;
      try {
        body = await source.fetchRaw(item);
      } catch (error) {
        if (error instanceof PermanentRemoteError) {
          logger.debug("fetch_item_permanent_error", { attempt, error: error.message });
          return { status: "failed", detail: DETAIL_NOT_AVAILABLE, lastError: error.message, attempts: attempt };
        }
        lastError = errorMessage(error);
        logger.debug("fetch_item_transport_error", { attempt, error: lastError });
        if (isLastAttempt) {
          break;
        }
        await this.sleep(options.retryBackoffMs);
        continue;
      }

      if (body.length < options.minResponseBytes) {
        logger.debug("fetch_item_short_response", { attempt, bytes: body.length });
        if (isLastAttempt) {
          return { status: "failed", detail: DETAIL_EMPTY_RESPONSE, attempts: attempt };
        }
        await this.sleep(options.retryBackoffMs);
        continue;
      }

      if (hasErrorMarker(body)) {
        return { status: "failed", detail: DETAIL_NOT_AVAILABLE, attempts: attempt };
      }

      // A body that would fail the artifact check later is never written.
      if (options.artifact.requireClosingTag && !endsWithClosingTag(body)) {
        logger.debug("fetch_item_truncated_response", { attempt, bytes: body.length });
        if (isLastAttempt) {
          return { status: "failed", detail: DETAIL_TRUNCATED, attempts: attempt };
        }
        await this.sleep(options.retryBackoffMs);
        continue;
      }

      try {
        await writeArtifactAtomic(item.artifactPath, body);
      } catch (error) {
        return { status: "failed", detail: `write failed: ${errorMessage(error)}`, attempts: attempt };
      }
      return { status: "success", attempts: attempt };
    }

    return {
      status: "failed",
      detail: DETAIL_MAX_RETRIES,
      lastError,
      attempts: Math.max(options.maxRetries, 0),
    };
  }
}
