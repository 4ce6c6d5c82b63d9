export {
	ARCHIVE_FILE,
	BACKUP_DIR,
	FilePositionStore,
	SNAPSHOT_FILE,
} from "./file-position-store.js";
export type { FilePositionStoreConfig } from "./file-position-store.js";
export { MemoryPositionStore } from "./memory-position-store.js";
export {
	checkPositionInvariants,
	decodeSnapshot,
	encodeSnapshot,
	parseSnapshot,
	serializeSnapshot,
} from "./snapshot-codec.js";
export type {
	ArchiveContents,
	ArchiveOutcome,
	CorruptLine,
	PositionStore,
	RestoredBackup,
} from "./types.js";
