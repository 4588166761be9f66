import { AppConfig } from "../config";
import { TrackerStore } from "./types";
import { SqliteTrackerStore } from "./sqliteStore";

export function createStore(config: AppConfig): TrackerStore {
  return new SqliteTrackerStore(config.storePath, {
    busyRetries: config.storeBusyRetries,
    busyRetryDelayMs: config.storeBusyRetryDelayMs,
  });
}

export * from "./types";
export * from "./sqliteStore";
export * from "./publishingStore";
