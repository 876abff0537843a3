import { AppConfig } from "../config";
import { createFetch } from "../core/fetch";
import { NoopSink } from "./baseSink";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  const { sink } = config;
  if (sink.type === "none") {
    return new NoopSink();
  }
  if (sink.type === "http") {
    return new HttpSink({
      endpoint: sink.endpoint,
      token: sink.token,
      runId,
      fetchFn: createFetch(config.ignoreHttpsErrors),
      timeoutMs: config.requestTimeoutMs,
      batchSize: sink.batchSize,
    });
  }
  return new LocalJsonlSink(config.outputDirs.manifests, runId);
}

export { HttpSink } from "./httpSink";
export type { HttpSinkOptions } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export { BaseSink, NoopSink } from "./baseSink";
export type { StageName } from "./baseSink";
export * from "./types";
