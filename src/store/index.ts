import { AppConfig } from "../config";
import { Logger } from "../observability";
import { JsonFileProgressStore } from "./jsonFileStore";
import { SqliteProgressStore } from "./sqliteStore";
import { ProgressStore } from "./types";

export function createProgressStore(config: AppConfig, logger: Logger): ProgressStore {
  if (config.progressBackend === "sqlite") {
    return new SqliteProgressStore(config.progressPath.replace(/\.json$/, ".sqlite"), logger);
  }
  return new JsonFileProgressStore(config.progressPath, logger);
}

export { InMemoryProgressStore } from "./memoryStore";
export { JsonFileProgressStore } from "./jsonFileStore";
export { SqliteProgressStore } from "./sqliteStore";
export * from "./types";
