/**
 * Storage Backends
 *
 * Picks the configured backend once at startup.
 */

import type { ResolvedConfig } from "../config.js";
import { openFileStore } from "./file-store.js";
import { openSqliteStore } from "./sqlite-store.js";
import type { StorageBackend } from "./types.js";

export { openFileStore } from "./file-store.js";
export type { FileStoreOptions } from "./file-store.js";
export { openSqliteStore, SqliteStore } from "./sqlite-store.js";
export type { SqliteStoreOptions } from "./sqlite-store.js";
export { ReviewStateCache, reviewStatesFromDocument } from "./review-state-cache.js";
export type * from "./types.js";

/**
 * Open the backend named by the configuration.
 * Throws StoreInitError if the SQLite store cannot be opened.
 */
export async function openStorage(
  config: Pick<ResolvedConfig, "storage" | "databasePath" | "reviewStatePath" | "statsPath">,
  getNow?: () => Date
): Promise<StorageBackend> {
  if (config.storage === "sqlite") {
    return openSqliteStore({ databasePath: config.databasePath, getNow });
  }
  return openFileStore({
    reviewStatePath: config.reviewStatePath,
    statsPath: config.statsPath,
    getNow,
  });
}
