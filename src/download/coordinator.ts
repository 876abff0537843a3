import fs from "node:fs";
import { ConfigError, errorMessage } from "../core/errors";
import { processWithConcurrency } from "../core/concurrency";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { ProgressStore } from "../store";
import { FetchOutcome, FetchSummary, ProgressRecord, WorkItem } from "../types";
import { ArtifactCriteria, scanArtifacts } from "./artifacts";
import { OutcomeChannel } from "./outcomeChannel";

export interface ItemFetcher {
  fetch(item: WorkItem): Promise<FetchOutcome>;
}

export interface FetchCoordinatorOptions {
  artifactsDir: string;
  concurrency: number;
  checkpointEvery: number;
  artifact: ArtifactCriteria;
}

export interface FetchCoordinatorDeps {
  worker: ItemFetcher;
  store: ProgressStore;
  sink: Sink;
  logger: Logger;
  metrics: MetricsRegistry;
  options: FetchCoordinatorOptions;
}

export interface FetchRunOptions {
  signal?: AbortSignal;
  retryFailed?: boolean;
}

interface RunState {
  progress: ProgressRecord;
  requested: number;
  dispatched: number;
  processed: number;
  succeeded: number;
  skipped: number;
  failed: number;
  reconciled: number;
  checkpoints: number;
}

async function ensureWritableDirectory(dir: string): Promise<void> {
  try {
    await fs.promises.mkdir(dir, { recursive: true });
    await fs.promises.access(dir, fs.constants.W_OK);
  } catch (error) {
    throw new ConfigError(`Artifact directory is not writable: ${dir} (${errorMessage(error)})`);
  }
}

function distinctItems(items: readonly WorkItem[]): WorkItem[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    if (seen.has(item.identifier)) {
      return false;
    }
    seen.add(item.identifier);
    return true;
  });
}

/**
 * Owns one fetch run: reconciles the checkpoint against the artifact
 * directory, partitions the remaining work over a fixed pool of workers and
 * folds their outcomes into the checkpoint from a single aggregator.
 */
export class FetchCoordinator {
  private readonly deps: FetchCoordinatorDeps;

  constructor(deps: FetchCoordinatorDeps) {
    this.deps = deps;
  }

  async run(items: readonly WorkItem[], runOptions: FetchRunOptions = {}): Promise<FetchSummary> {
    const { store, logger, options } = this.deps;
    await ensureWritableDirectory(options.artifactsDir);

    const progress = await store.load();
    let changed = false;

    if (runOptions.retryFailed && progress.failed.size > 0) {
      logger.info("fetch_retrying_failed", { count: progress.failed.size });
      progress.failed.clear();
      changed = true;
    }

    const state: RunState = {
      progress,
      requested: 0,
      dispatched: 0,
      processed: 0,
      succeeded: 0,
      skipped: 0,
      failed: 0,
      reconciled: 0,
      checkpoints: 0,
    };

    for (const identifier of await scanArtifacts(options.artifactsDir, options.artifact)) {
      if (!progress.downloaded.has(identifier)) {
        progress.downloaded.add(identifier);
        state.reconciled += 1;
        changed = true;
      }
      if (progress.failed.delete(identifier)) {
        changed = true;
      }
    }

    const requested = distinctItems(items);
    state.requested = requested.length;
    const toFetch = requested.filter(
      (item) => !progress.downloaded.has(item.identifier) && !progress.failed.has(item.identifier),
    );

    logger.info("fetch_plan", {
      requested: requested.length,
      toFetch: toFetch.length,
      previouslyDownloaded: progress.downloaded.size,
      previouslyFailed: progress.failed.size,
      reconciled: state.reconciled,
      workers: options.concurrency,
    });

    if (toFetch.length === 0) {
      if (changed) {
        await this.checkpoint(state);
      }
      logger.info("fetch_nothing_to_do", { downloadedTotal: progress.downloaded.size });
      return this.summarize(state, false);
    }

    const channel = new OutcomeChannel<FetchOutcome>();
    const aggregator = this.aggregate(channel, state, toFetch.length);
    try {
      await processWithConcurrency(
        toFetch,
        options.concurrency,
        async (item) => {
          state.dispatched += 1;
          channel.push(await this.fetchOne(item));
        },
        runOptions.signal,
      );
    } finally {
      channel.close();
      await aggregator;
    }

    await this.checkpoint(state);
    await this.flushSink();

    const cancelled = state.dispatched < toFetch.length;
    if (cancelled) {
      logger.warn("fetch_cancelled", { dispatched: state.dispatched, remaining: toFetch.length - state.dispatched });
    }
    const summary = this.summarize(state, cancelled);
    logger.info("fetch_finished", { ...summary });
    return summary;
  }

  private async fetchOne(item: WorkItem): Promise<FetchOutcome> {
    try {
      return await this.deps.worker.fetch(item);
    } catch (error) {
      return {
        identifier: item.identifier,
        status: "failed",
        detail: errorMessage(error),
        attempts: 0,
        durationMs: 0,
        finishedAt: new Date().toISOString(),
      };
    }
  }

  private async aggregate(channel: OutcomeChannel<FetchOutcome>, state: RunState, total: number): Promise<void> {
    const { logger, metrics, options } = this.deps;

    for await (const outcome of channel) {
      state.processed += 1;

      if (outcome.status === "failed") {
        state.progress.failed.add(outcome.identifier);
        state.failed += 1;
        metrics.incrementCounter("fetch_failed", 1);
        logger.warn("fetch_item_failed", {
          identifier: outcome.identifier,
          detail: outcome.detail,
          lastError: outcome.lastError,
          attempts: outcome.attempts,
        });
      } else {
        state.progress.downloaded.add(outcome.identifier);
        state.progress.failed.delete(outcome.identifier);
        if (outcome.status === "success") {
          state.succeeded += 1;
          metrics.incrementCounter("fetch_ok", 1);
        } else {
          state.skipped += 1;
          metrics.incrementCounter("fetch_skipped", 1);
        }
        logger.debug("fetch_item_done", {
          identifier: outcome.identifier,
          status: outcome.status,
          attempts: outcome.attempts,
          durationMs: outcome.durationMs,
        });
      }

      await this.publish(outcome);

      if (state.processed % options.checkpointEvery === 0) {
        try {
          await this.checkpoint(state);
        } catch (error) {
          logger.error("fetch_checkpoint_failed", { processed: state.processed, error: errorMessage(error) });
        }
        logger.info("fetch_progress", {
          processed: state.processed,
          total,
          succeeded: state.succeeded,
          skipped: state.skipped,
          failed: state.failed,
        });
      }
    }
  }

  private async publish(outcome: FetchOutcome): Promise<void> {
    try {
      await this.deps.sink.publishFetchOutcomes([outcome]);
    } catch (error) {
      this.deps.logger.warn("fetch_sink_publish_failed", { identifier: outcome.identifier, error: errorMessage(error) });
    }
  }

  private async flushSink(): Promise<void> {
    try {
      await this.deps.sink.flush();
    } catch (error) {
      this.deps.logger.warn("fetch_sink_flush_failed", { error: errorMessage(error) });
    }
  }

  private async checkpoint(state: RunState): Promise<void> {
    await this.deps.store.save(state.progress);
    state.checkpoints += 1;
    this.deps.metrics.incrementCounter("checkpoints_saved", 1);
  }

  private summarize(state: RunState, cancelled: boolean): FetchSummary {
    return {
      requested: state.requested,
      dispatched: state.dispatched,
      succeeded: state.succeeded,
      skipped: state.skipped,
      failed: state.failed,
      reconciled: state.reconciled,
      downloadedTotal: state.progress.downloaded.size,
      failedTotal: state.progress.failed.size,
      checkpoints: state.checkpoints,
      cancelled,
    };
  }
}
