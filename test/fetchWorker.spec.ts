import fs from "node:fs";
import path from "node:path";
import { PermanentRemoteError } from "../src/core/errors";
import {
  DETAIL_ALREADY_EXISTS,
  DETAIL_EMPTY_RESPONSE,
  DETAIL_MAX_RETRIES,
  DETAIL_NOT_AVAILABLE,
  DETAIL_TRUNCATED,
  FetchWorker,
  RateLimiter,
  RemoteSource,
  toWorkItem,
} from "../src/download";
import { MetricsRegistry } from "../src/observability";
import { articleXml, FakeRemoteSource, FakeTimeSource, makeTempDir, removeDir, silentLogger } from "./helpers";

describe("FetchWorker", () => {
  let dir: string;
  let metrics: MetricsRegistry;
  let backoffs: number[];

  beforeEach(async () => {
    dir = await makeTempDir();
    metrics = new MetricsRegistry();
    backoffs = [];
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function createWorker(source: RemoteSource, rateLimiter = new RateLimiter(0)): FetchWorker {
    return new FetchWorker({
      source,
      rateLimiter,
      logger: silentLogger(),
      metrics,
      options: {
        maxRetries: 3,
        retryBackoffMs: 1000,
        minResponseBytes: 200,
        artifact: { minBytes: 100, requireClosingTag: true },
      },
      sleep: async (ms) => {
        backoffs.push(ms);
      },
    });
  }

  it("writes the artifact on success", async () => {
    const source = new FakeRemoteSource();
    const item = toWorkItem("PMC1", dir);

    const outcome = await createWorker(source).fetch(item);

    expect(outcome).toMatchObject({ identifier: "PMC1", status: "success", attempts: 1 });
    expect(outcome.detail).toBeUndefined();
    await expect(fs.promises.readFile(item.artifactPath, "utf-8")).resolves.toBe(articleXml("PMC1"));
    expect(backoffs).toEqual([]);
  });

  it("passes the identifier without its prefix to the source", async () => {
    const remoteIds: string[] = [];
    const source = new FakeRemoteSource(async (item) => {
      remoteIds.push(item.remoteId);
      return Buffer.from(articleXml(item.identifier));
    });

    await createWorker(source).fetch(toWorkItem("PMC123", dir));

    expect(remoteIds).toEqual(["123"]);
  });

  it("gives up after the retry cap on transport errors", async () => {
    const source = new FakeRemoteSource(async () => {
      throw new Error("socket hang up");
    });

    const outcome = await createWorker(source).fetch(toWorkItem("PMC1", dir));

    expect(outcome).toMatchObject({
      status: "failed",
      detail: DETAIL_MAX_RETRIES,
      lastError: "socket hang up",
      attempts: 3,
    });
    expect(source.calls).toEqual(["PMC1", "PMC1", "PMC1"]);
    expect(backoffs).toEqual([1000, 1000]);
    expect(metrics.getCounter("fetch_retries")).toBe(2);
  });

  it("recovers when a retry succeeds", async () => {
    const source = new FakeRemoteSource(async (item, call) => {
      if (call === 1) {
        throw new Error("HTTP 503");
      }
      return Buffer.from(articleXml(item.identifier));
    });

    const outcome = await createWorker(source).fetch(toWorkItem("PMC1", dir));

    expect(outcome).toMatchObject({ status: "success", attempts: 2 });
    expect(backoffs).toEqual([1000]);
  });

  it("does not retry a permanent failure", async () => {
    const source = new FakeRemoteSource(async () => {
      throw new PermanentRemoteError("HTTP 404", 404);
    });

    const outcome = await createWorker(source).fetch(toWorkItem("PMC1", dir));

    expect(outcome).toMatchObject({ status: "failed", detail: DETAIL_NOT_AVAILABLE, attempts: 1 });
    expect(source.calls).toEqual(["PMC1"]);
    expect(backoffs).toEqual([]);
  });

  it("reports an empty response once every attempt came back short", async () => {
    const source = new FakeRemoteSource(async () => Buffer.from("<empty/>"));

    const outcome = await createWorker(source).fetch(toWorkItem("PMC1", dir));

    expect(outcome).toMatchObject({ status: "failed", detail: DETAIL_EMPTY_RESPONSE, attempts: 3 });
    expect(backoffs).toEqual([1000, 1000]);
    expect(fs.existsSync(path.join(dir, "PMC1.xml"))).toBe(false);
  });

  it("retries a body cut off mid-document and then succeeds", async () => {
    const source = new FakeRemoteSource(async (item, call) =>
      Buffer.from(call === 1 ? articleXml(item.identifier).slice(0, 250) : articleXml(item.identifier)),
    );
    const item = toWorkItem("PMC1", dir);

    const outcome = await createWorker(source).fetch(item);

    expect(outcome).toMatchObject({ status: "success", attempts: 2 });
    expect(backoffs).toEqual([1000]);
    await expect(fs.promises.readFile(item.artifactPath, "utf-8")).resolves.toBe(articleXml("PMC1"));
  });

  it("never records a body that stays truncated", async () => {
    const body = `<?xml version="1.0"?><pmc-articleset><article><body><p>${"x".repeat(400)}`;
    const source = new FakeRemoteSource(async () => Buffer.from(body));

    const outcome = await createWorker(source).fetch(toWorkItem("PMC1", dir));

    expect(outcome).toMatchObject({ status: "failed", detail: DETAIL_TRUNCATED, attempts: 3 });
    expect(backoffs).toEqual([1000, 1000]);
    expect(fs.existsSync(path.join(dir, "PMC1.xml"))).toBe(false);
  });

  it("treats an error document as unavailable without writing it", async () => {
    const body = `<?xml version="1.0"?><pmc-articleset><ERROR>ID not found in PMC</ERROR>${" ".repeat(300)}</pmc-articleset>`;
    const source = new FakeRemoteSource(async () => Buffer.from(body));

    const outcome = await createWorker(source).fetch(toWorkItem("PMC1", dir));

    expect(outcome).toMatchObject({ status: "failed", detail: DETAIL_NOT_AVAILABLE, attempts: 1 });
    expect(fs.existsSync(path.join(dir, "PMC1.xml"))).toBe(false);
  });

  it("skips an item whose artifact is already complete", async () => {
    const source = new FakeRemoteSource();
    const item = toWorkItem("PMC1", dir);
    await fs.promises.writeFile(item.artifactPath, articleXml("PMC1"));

    const outcome = await createWorker(source).fetch(item);

    expect(outcome).toMatchObject({ status: "skipped_existing", detail: DETAIL_ALREADY_EXISTS, attempts: 0 });
    expect(source.calls).toEqual([]);
  });

  it("fetches again over a truncated artifact", async () => {
    const source = new FakeRemoteSource();
    const item = toWorkItem("PMC1", dir);
    await fs.promises.writeFile(item.artifactPath, articleXml("PMC1").slice(0, 250));

    const outcome = await createWorker(source).fetch(item);

    expect(outcome.status).toBe("success");
    await expect(fs.promises.readFile(item.artifactPath, "utf-8")).resolves.toBe(articleXml("PMC1"));
  });

  it("reports a local write failure without retrying", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.promises.writeFile(blocker, "regular file");
    const source = new FakeRemoteSource();

    const outcome = await createWorker(source).fetch(toWorkItem("PMC1", path.join(blocker, "xml")));

    expect(outcome.status).toBe("failed");
    expect(outcome.detail?.startsWith("write failed: ")).toBe(true);
    expect(outcome.attempts).toBe(1);
    expect(source.calls).toEqual(["PMC1"]);
  });

  it("waits on the shared rate limiter before every attempt", async () => {
    const clock = new FakeTimeSource();
    const source = new FakeRemoteSource(async () => {
      throw new Error("ECONNRESET");
    });

    await createWorker(source, new RateLimiter(100, clock)).fetch(toWorkItem("PMC1", dir));

    expect(clock.sleeps).toEqual([100, 100]);
  });
});
