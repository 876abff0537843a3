import { ExtractionResult, FetchOutcome } from "../types";

/** Receives per-item results as a run progresses. */
export interface Sink {
  publishFetchOutcomes(outcomes: FetchOutcome[]): Promise<void>;
  publishExtractionResults(results: ExtractionResult[]): Promise<void>;
  /** Delivers anything still buffered. */
  flush(): Promise<void>;
}
