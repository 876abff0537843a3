import { ProgressRecord } from "../types";
import { emptyProgress, ProgressStore, serializeProgress, SerializedProgress } from "./types";

export class InMemoryProgressStore implements ProgressStore {
  private snapshot?: SerializedProgress;
  saves = 0;

  constructor(initial?: { downloaded?: Iterable<string>; failed?: Iterable<string> }) {
    if (initial) {
      this.snapshot = serializeProgress({
        downloaded: new Set(initial.downloaded ?? []),
        failed: new Set(initial.failed ?? []),
      });
    }
  }

  get lastSaved(): SerializedProgress | undefined {
    return this.snapshot;
  }

  async load(): Promise<ProgressRecord> {
    if (!this.snapshot) {
      return emptyProgress();
    }
    return {
      downloaded: new Set(this.snapshot.downloaded),
      failed: new Set(this.snapshot.failed),
      lastUpdated: this.snapshot.last_updated,
    };
  }

  async save(record: ProgressRecord): Promise<void> {
    this.snapshot = serializeProgress(record);
    this.saves += 1;
    record.lastUpdated = this.snapshot.last_updated;
  }

  async close(): Promise<void> {
    return;
  }
}
