export interface TimeSource {
  nowMs(): number;
  sleepMs(ms: number): Promise<void>;
}

export class RealTimeSource implements TimeSource {
  nowMs(): number {
    return performance.now();
  }

  async sleepMs(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Enforces a minimum gap between consecutive grants across every caller
 * sharing the instance. Grants are handed out in call order through a
 * promise chain, so the chain is only occupied while waiting out the gap and
 * never while the caller performs its request.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly timeSource: TimeSource;
  private lastGrantMs = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();

  constructor(minIntervalMs: number, timeSource: TimeSource = new RealTimeSource()) {
    this.minIntervalMs = minIntervalMs;
    this.timeSource = timeSource;
  }

  static fromRate(maxPerSecond: number, timeSource?: TimeSource): RateLimiter {
    const interval = maxPerSecond > 0 && Number.isFinite(maxPerSecond) ? 1000 / maxPerSecond : 0;
    return new RateLimiter(interval, timeSource);
  }

  get intervalMs(): number {
    return this.minIntervalMs;
  }

  wait(): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return Promise.resolve();
    }

    const turn = this.tail.then(() => this.grant());
    this.tail = turn;
    return turn;
  }

  private async grant(): Promise<void> {
    const elapsed = this.timeSource.nowMs() - this.lastGrantMs;
    if (elapsed < this.minIntervalMs) {
      await this.timeSource.sleepMs(this.minIntervalMs - elapsed);
    }
    this.lastGrantMs = this.timeSource.nowMs();
  }
}
