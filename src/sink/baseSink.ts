import { ExtractionResult, FetchOutcome } from "../types";
import { Sink } from "./types";

export type StageName = "fetch" | "extract";

export abstract class BaseSink implements Sink {
  async publishFetchOutcomes(outcomes: FetchOutcome[]): Promise<void> {
    await this.publish("fetch", outcomes);
  }

  async publishExtractionResults(results: ExtractionResult[]): Promise<void> {
    await this.publish("extract", results);
  }

  async flush(): Promise<void> {
    return;
  }

  protected abstract publish(stage: StageName, records: Array<FetchOutcome | ExtractionResult>): Promise<void>;
}

export class NoopSink extends BaseSink {
  protected async publish(): Promise<void> {
    return;
  }
}
