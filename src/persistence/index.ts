export { FileStateStore } from "./file-state-store.js";
export type { FileStateStoreConfig } from "./file-state-store.js";
export { MemoryStateStore } from "./memory-state-store.js";
export {
	SNAPSHOT_VERSION,
	engineSnapshotSchema,
	fillCursorSnapshotSchema,
} from "./types.js";
export type { EngineSnapshot, LoadError, StateStore } from "./types.js";
