import type { Storage } from "@statbeacon/storage";
import { createLogger } from "@statbeacon/logger";
import type { StateStore, StoredState } from "../types.js";
import { MemoryStateStore } from "./memory-store.js";
import { FileStateStore } from "./file-store.js";
import { SettingsStateStore } from "./settings-store.js";

const log = createLogger("metrics:state:factory");

export type StateStoreOptions =
  | { kind: "memory"; initial?: StoredState }
  | { kind: "file"; path?: string }
  | { kind: "sqlite"; storage: Storage; prefix?: string };

/**
 * Create a StateStore for the given backend.
 *
 * - memory -> MemoryStateStore
 * - file   -> FileStateStore (JSON document, default ~/.statbeacon/metrics.json)
 * - sqlite -> SettingsStateStore on the storage settings table
 */
export function createStateStore(options: StateStoreOptions = { kind: "file" }): StateStore {
  log.debug("creating state store: " + options.kind);

  switch (options.kind) {
    case "memory":
      return new MemoryStateStore(options.initial);
    case "file":
      return new FileStateStore(options.path);
    case "sqlite":
      return new SettingsStateStore(options.storage.settings, options.prefix);
  }
}
