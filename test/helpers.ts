import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { RemoteSource, TimeSource } from "../src/download";
import { Logger } from "../src/observability";
import { Sink } from "../src/sink";
import { ExtractionResult, FetchOutcome, WorkItem } from "../src/types";

export async function makeTempDir(prefix = "corpus-harvester-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export function silentLogger(component = "test"): Logger {
  return new Logger({ component, runId: "test-run", minLevel: "silent" });
}

export class FakeTimeSource implements TimeSource {
  now = 0;
  readonly sleeps: number[] = [];

  nowMs(): number {
    return this.now;
  }

  async sleepMs(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.now += ms;
  }
}

/** A document that passes both the response-size and the closing-tag checks. */
export function articleXml(identifier: string): string {
  const filler = "Placeholder paragraph text for a test article body. ".repeat(6);
  return `<?xml version="1.0" encoding="UTF-8"?>\n<pmc-articleset><article><body><p>${identifier} ${filler}</p></body></article></pmc-articleset>\n`;
}

type FetchHandler = (item: WorkItem, call: number) => Promise<Buffer>;

export class FakeRemoteSource implements RemoteSource {
  readonly calls: string[] = [];
  private readonly handler: FetchHandler;

  constructor(handler: FetchHandler = async (item) => Buffer.from(articleXml(item.identifier))) {
    this.handler = handler;
  }

  async fetchRaw(item: WorkItem): Promise<Buffer> {
    this.calls.push(item.identifier);
    const call = this.calls.filter((identifier) => identifier === item.identifier).length;
    return this.handler(item, call);
  }
}

export class RecordingSink implements Sink {
  readonly fetchOutcomes: FetchOutcome[] = [];
  readonly extractionResults: ExtractionResult[] = [];

  async publishFetchOutcomes(outcomes: FetchOutcome[]): Promise<void> {
    this.fetchOutcomes.push(...outcomes);
  }

  async publishExtractionResults(results: ExtractionResult[]): Promise<void> {
    this.extractionResults.push(...results);
  }

  async flush(): Promise<void> {
    return;
  }
}
