import { sleep } from "../core/concurrency";
import { createFetch, FetchLike, fetchWithTimeout } from "../core/fetch";
import { ExtractionResult, FetchOutcome } from "../types";
import { BaseSink, StageName } from "./baseSink";

type StageRecord = FetchOutcome | ExtractionResult;

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  runId?: string;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Records buffered per stage before a POST is sent. */
  batchSize?: number;
}

type Delivery = { kind: "delivered" } | { kind: "retry"; reason: string } | { kind: "rejected"; reason: string };

function classify(status: number, body: string): Delivery {
  if (status >= 200 && status < 300) {
    return { kind: "delivered" };
  }
  const reason = `status ${status}: ${body}`;
  return status === 408 || status === 429 || status >= 500 ? { kind: "retry", reason } : { kind: "rejected", reason };
}

/**
 * POSTs results to a collector in batches. Each batch carries an
 * idempotency key built from the run, the stage and its identifiers, so a
 * retried POST can be deduplicated by the receiver.
 */
export class HttpSink extends BaseSink {
  private readonly options: HttpSinkOptions;
  private readonly fetchFn: FetchLike;
  private readonly pending: Record<StageName, StageRecord[]> = { fetch: [], extract: [] };

  constructor(options: HttpSinkOptions = {}) {
    super();
    this.options = options;
    this.fetchFn = options.fetchFn ?? createFetch(false);
  }

  async flush(): Promise<void> {
    await this.drain("fetch", 1);
    await this.drain("extract", 1);
  }

  protected async publish(stage: StageName, records: StageRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    if (!this.options.endpoint) {
      throw new Error("HTTP sink is not configured");
    }
    this.pending[stage].push(...records);
    await this.drain(stage, Math.max(1, this.options.batchSize ?? 50));
  }

  private async drain(stage: StageName, threshold: number): Promise<void> {
    const batchSize = Math.max(1, this.options.batchSize ?? 50);
    while (this.pending[stage].length >= threshold) {
      const batch = this.pending[stage].splice(0, batchSize);
      await this.post(stage, batch);
    }
  }

  private async post(stage: StageName, batch: StageRecord[]): Promise<void> {
    const endpoint = this.options.endpoint ?? "";
    const runId = this.options.runId ?? "run";
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": `${runId}:${stage}:${batch.map((record) => record.identifier).join(",")}`,
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    const body = JSON.stringify({ stage, runId, sentAt: new Date().toISOString(), items: batch });

    const maxRetries = this.options.maxRetries ?? 3;
    const retryDelayMs = this.options.retryDelayMs ?? 250;
    for (let attempt = 1; ; attempt += 1) {
      let delivery: Delivery;
      try {
        delivery = await fetchWithTimeout(
          this.fetchFn,
          endpoint,
          { method: "POST", headers, body },
          this.options.timeoutMs ?? 15_000,
          async (response) => classify(response.status, response.ok ? "" : await response.text()),
        );
      } catch (error) {
        if (attempt > maxRetries) {
          throw error;
        }
        delivery = { kind: "retry", reason: String(error) };
      }

      if (delivery.kind === "delivered") {
        return;
      }
      if (delivery.kind === "rejected") {
        throw new Error(`HTTP sink rejected ${stage} batch with ${delivery.reason}`);
      }
      if (attempt > maxRetries) {
        throw new Error(`HTTP sink gave up on ${stage} batch after ${attempt} attempts, last ${delivery.reason}`);
      }
      await sleep(retryDelayMs * attempt);
    }
  }
}
