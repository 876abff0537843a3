import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { ProgressRecord } from "../types";
import { emptyProgress, ProgressStore, serializeProgress } from "./types";

type ProgressRow = {
  identifier: string;
  status: "downloaded" | "failed";
};

type MetaRow = {
  value: string;
};

/**
 * Keeps the checkpoint in a SQLite database. Each save replaces the table
 * contents inside one transaction, so readers see either the previous or the
 * new checkpoint.
 */
export class SqliteProgressStore implements ProgressStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(dbPath: string, logger: Logger) {
    const absolutePath = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    this.logger = logger;
    try {
      this.db = this.open(absolutePath);
    } catch (error) {
      const asidePath = `${absolutePath}.corrupt-${Date.now()}`;
      logger.warn("progress_corrupt_starting_fresh", { path: absolutePath, movedTo: asidePath, error: errorMessage(error) });
      fs.renameSync(absolutePath, asidePath);
      this.db = this.open(absolutePath);
    }
  }

  async load(): Promise<ProgressRecord> {
    try {
      const rows = this.db.prepare(`SELECT identifier, status FROM progress`).all() as ProgressRow[];
      const meta = this.db.prepare(`SELECT value FROM progress_meta WHERE key = 'last_updated'`).get() as
        | MetaRow
        | undefined;

      const record = emptyProgress();
      for (const row of rows) {
        if (row.status === "downloaded") {
          record.downloaded.add(row.identifier);
        } else {
          record.failed.add(row.identifier);
        }
      }
      record.lastUpdated = meta?.value;
      return record;
    } catch (error) {
      this.logger.warn("progress_corrupt_starting_fresh", { error: errorMessage(error) });
      return emptyProgress();
    }
  }

  async save(record: ProgressRecord): Promise<void> {
    const payload = serializeProgress(record);
    const insert = this.db.prepare(`INSERT INTO progress (identifier, status) VALUES (?, ?)`);
    const replaceAll = this.db.transaction(() => {
      this.db.prepare(`DELETE FROM progress`).run();
      for (const identifier of payload.downloaded) {
        insert.run(identifier, "downloaded");
      }
      for (const identifier of payload.failed) {
        insert.run(identifier, "failed");
      }
      this.db
        .prepare(
          `
          INSERT INTO progress_meta (key, value) VALUES ('last_updated', @value)
          ON CONFLICT(key) DO UPDATE SET value = excluded.value
        `,
        )
        .run({ value: payload.last_updated });
    });
    replaceAll();
    record.lastUpdated = payload.last_updated;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private open(absolutePath: string): Database.Database {
    const db = new Database(absolutePath);
    try {
      db.pragma("journal_mode = WAL");
      this.initializeSchema(db);
    } catch (error) {
      db.close();
      throw error;
    }
    return db;
  }

  private initializeSchema(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS progress (
        identifier TEXT PRIMARY KEY,
        status TEXT NOT NULL CHECK (status IN ('downloaded', 'failed'))
      );

      CREATE TABLE IF NOT EXISTS progress_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_progress_status ON progress(status);
    `);
  }
}
