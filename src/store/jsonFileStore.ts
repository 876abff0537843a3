import fs from "node:fs";
import path from "node:path";
import { errorMessage, isMissingFileError } from "../core/errors";
import { Logger } from "../observability";
import { ProgressRecord } from "../types";
import { deserializeProgress, emptyProgress, ProgressStore, serializeProgress } from "./types";

export class JsonFileProgressStore implements ProgressStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private saveCount = 0;

  constructor(filePath: string, logger: Logger) {
    this.filePath = path.resolve(filePath);
    this.logger = logger;
  }

  async load(): Promise<ProgressRecord> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.warn("progress_unreadable_starting_fresh", { path: this.filePath, error: errorMessage(error) });
      }
      return emptyProgress();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("progress_corrupt_starting_fresh", { path: this.filePath, error: errorMessage(error) });
      return emptyProgress();
    }

    const record = deserializeProgress(parsed);
    if (!record) {
      this.logger.warn("progress_corrupt_starting_fresh", { path: this.filePath, error: "not a JSON object" });
      return emptyProgress();
    }
    return record;
  }

  async save(record: ProgressRecord): Promise<void> {
    const payload = serializeProgress(record);
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });

    this.saveCount += 1;
    const tempPath = `${this.filePath}.${process.pid}.${this.saveCount}.tmp`;
    try {
      const handle = await fs.promises.open(tempPath, "w");
      try {
        await handle.writeFile(JSON.stringify(payload), "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
    record.lastUpdated = payload.last_updated;
  }

  async close(): Promise<void> {
    return;
  }
}
