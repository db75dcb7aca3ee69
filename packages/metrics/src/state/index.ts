export { MemoryStateStore } from "./memory-store.js";
export { FileStateStore, DEFAULT_STATE_PATH } from "./file-store.js";
export { SettingsStateStore } from "./settings-store.js";
export { createStateStore } from "./factory.js";
export type { StateStoreOptions } from "./factory.js";
export { withDefaults } from "./document.js";
