import fs from "node:fs";
import path from "node:path";
import { AppConfig, DEFAULT_CONFIG, withOutputBase } from "../src/config";
import { CommandContext, runExtract, runFetch, runSelect, runStatus } from "../src/core/commands";
import { ConfigError } from "../src/core/errors";
import { RemoteSource } from "../src/download";
import { MetricsRegistry } from "../src/observability";
import { jatsArticle } from "./fixtures";
import { FakeRemoteSource, makeTempDir, RecordingSink, removeDir, silentLogger } from "./helpers";

describe("commands", () => {
  let dir: string;
  let config: AppConfig;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = {
      ...withOutputBase(DEFAULT_CONFIG, dir),
      email: "someone@example.org",
      catalogPath: path.join(dir, "oa_file_list.csv"),
      maxRequestsPerSecond: 1000,
      retryBackoffMs: 0,
      minBodyChars: 20,
    };
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function context(source?: RemoteSource, signal?: AbortSignal): CommandContext {
    return {
      runId: "test-run",
      config,
      logger: silentLogger(),
      metrics: new MetricsRegistry(),
      sink: new RecordingSink(),
      source,
      signal,
    };
  }

  const articleSource = (): FakeRemoteSource =>
    new FakeRemoteSource(async (item) => Buffer.from(jatsArticle(item.remoteId)));

  it("selects, fetches, extracts and reports status", async () => {
    await fs.promises.writeFile(
      config.catalogPath,
      [
        "File,Article Citation,Accession ID,Last Updated (YYYY-MM-DD HH:MM:SS),PMID,License",
        "a.tar.gz,Journal of Dairy Placeholder,PMC10,2024-01-01 00:00:00,1,CC BY",
        "b.tar.gz,Journal of Astronomy Placeholder,PMC20,2024-01-01 00:00:00,2,CC BY",
        "c.tar.gz,Food Placeholder Letters,PMC30,2024-01-01 00:00:00,3,CC BY",
      ].join("\n"),
      "utf-8",
    );
    const source = articleSource();

    const entries = await runSelect(context());
    const fetchSummary = await runFetch(context(source));
    const extractSummary = await runExtract(context());
    const status = await runStatus(context());

    expect(entries.map((entry) => entry.identifier)).toEqual(["PMC10", "PMC30"]);
    expect([...source.calls].sort()).toEqual(["PMC10", "PMC30"]);
    expect(fetchSummary).toMatchObject({ succeeded: 2, downloadedTotal: 2, cancelled: false });
    expect(extractSummary).toMatchObject({ extracted: 2, skipped: 0 });
    expect(status).toMatchObject({ downloaded: 2, failed: 0, artifacts: 2, untracked: 0 });
  });

  it("reuses a saved selection on resume", async () => {
    await fs.promises.writeFile(
      config.selectionPath,
      JSON.stringify([{ identifier: "PMC7", remoteId: "7", pmid: "", citation: "", license: "" }]),
      "utf-8",
    );

    const entries = await runSelect(context(), { resume: true });

    expect(entries.map((entry) => entry.identifier)).toEqual(["PMC7"]);
  });

  it("fetches an explicit identifier list", async () => {
    const idsPath = path.join(dir, "ids.txt");
    await fs.promises.writeFile(idsPath, "PMC1\nPMC2\nPMC3\n", "utf-8");
    const source = articleSource();

    const summary = await runFetch(context(source), { idsPath, maxResults: 2 });

    expect([...source.calls].sort()).toEqual(["PMC1", "PMC2"]);
    expect(summary.requested).toBe(2);
    expect(fs.existsSync(config.progressPath)).toBe(true);
  });

  it("refuses to fetch without a contact email", async () => {
    config = { ...config, email: "" };

    await expect(runFetch(context(articleSource()), { idsPath: "unused" })).rejects.toBeInstanceOf(ConfigError);
  });

  it("refuses to fetch before anything was selected", async () => {
    await expect(runFetch(context(articleSource()))).rejects.toThrow("No selection found");
  });

  it("keeps progress in SQLite when configured", async () => {
    config = { ...config, progressBackend: "sqlite" };
    const idsPath = path.join(dir, "ids.txt");
    await fs.promises.writeFile(idsPath, "PMC1\n", "utf-8");

    await runFetch(context(articleSource()), { idsPath });
    const status = await runStatus(context());

    expect(fs.existsSync(path.join(dir, "download_progress.sqlite"))).toBe(true);
    expect(status).toMatchObject({ downloaded: 1, artifacts: 1 });
  });
});
