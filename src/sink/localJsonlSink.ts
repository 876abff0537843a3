import fs from "node:fs";
import path from "node:path";
import { ExtractionResult, FetchOutcome } from "../types";
import { BaseSink, StageName } from "./baseSink";

const MANIFEST_FILES: Record<StageName, string> = {
  fetch: "fetch-outcomes.jsonl",
  extract: "extractions.jsonl",
};

/**
 * Appends a manifest line per result under `manifestsDir`, so repeated runs
 * accumulate a history keyed by run id.
 */
export class LocalJsonlSink extends BaseSink {
  private readonly manifestsDir: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    super();
    this.manifestsDir = path.resolve(manifestsDir);
    this.runId = runId;
  }

  manifestPath(stage: StageName): string {
    return path.join(this.manifestsDir, MANIFEST_FILES[stage]);
  }

  protected async publish(stage: StageName, records: Array<FetchOutcome | ExtractionResult>): Promise<void> {
    if (records.length === 0) {
      return;
    }
    const lines = records.map((record) => `${JSON.stringify({ runId: this.runId, stage, ...record })}\n`);
    await fs.promises.mkdir(this.manifestsDir, { recursive: true });
    await fs.promises.appendFile(this.manifestPath(stage), lines.join(""), "utf-8");
  }
}
