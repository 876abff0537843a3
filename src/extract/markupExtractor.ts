import { CorpusRecord } from "../types";

export interface MarkupExtractor {
  /** Returns `undefined` for documents that are malformed or too short to keep. */
  extract(markup: string, fallbackIdentifier: string): CorpusRecord | undefined;
}
