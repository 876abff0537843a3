import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSnapshot {
  elapsedMs: number;
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
  /** Completed fetches (written or skipped) per second of wall time. */
  fetchThroughput: number;
}

interface TimerStats {
  count: number;
  total: number;
  min: number;
  max: number;
}

/** In-process counters and duration statistics for one command run. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, TimerStats>();
  private readonly startedAt: number;
  private readonly clock: () => number;

  constructor(clock: () => number = Date.now) {
    this.clock = clock;
    this.startedAt = clock();
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.getCounter(name) + value);
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  /** Starts a timer; the returned function records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const begin = this.clock();
    return () => {
      const durationMs = this.clock() - begin;
      this.record(name, durationMs);
      return durationMs;
    };
  }

  record(name: MetricTimerName, durationMs: number): void {
    const stats = this.timers.get(name);
    if (!stats) {
      this.timers.set(name, { count: 1, total: durationMs, min: durationMs, max: durationMs });
      return;
    }
    stats.count += 1;
    stats.total += durationMs;
    stats.min = Math.min(stats.min, durationMs);
    stats.max = Math.max(stats.max, durationMs);
  }

  snapshot(): MetricsSnapshot {
    const elapsedMs = this.clock() - this.startedAt;
    const completed = this.getCounter("fetch_ok") + this.getCounter("fetch_skipped");
    return {
      elapsedMs,
      counters: {
        items_selected: this.getCounter("items_selected"),
        fetch_ok: this.getCounter("fetch_ok"),
        fetch_skipped: this.getCounter("fetch_skipped"),
        fetch_failed: this.getCounter("fetch_failed"),
        fetch_retries: this.getCounter("fetch_retries"),
        checkpoints_saved: this.getCounter("checkpoints_saved"),
        extract_ok: this.getCounter("extract_ok"),
        extract_skipped: this.getCounter("extract_skipped"),
      },
      timers: {
        fetch_ms: this.summarize("fetch_ms"),
        extract_ms: this.summarize("extract_ms"),
      },
      fetchThroughput: elapsedMs > 0 ? Number(((completed * 1000) / elapsedMs).toFixed(2)) : 0,
    };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", { ...this.snapshot() });
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const stats = this.timers.get(name);
    if (!stats) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }
    return {
      count: stats.count,
      min: stats.min,
      max: stats.max,
      avg: Number((stats.total / stats.count).toFixed(2)),
    };
  }
}
