import type { AppConfig } from "../config";
import { JsonRecordStore } from "./jsonStore";
import { SqliteRecordStore } from "./sqliteStore";
import type { RecordStore } from "./types";

export function createStore(config: AppConfig): RecordStore {
  switch (config.storeMode) {
    case "sqlite":
      return new SqliteRecordStore(config.sqlitePath);
    case "json":
      return new JsonRecordStore(config.statePath);
  }
}

export * from "./types";
export { JsonRecordStore } from "./jsonStore";
export { InMemoryRecordStore } from "./memoryStore";
export { SqliteRecordStore } from "./sqliteStore";
