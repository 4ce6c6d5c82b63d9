export { FileRunLock, type FileRunLockConfig } from "./file-run-lock.js";
export {
	isLockBusy,
	type LockBusy,
	type LockMarker,
	type LockState,
	type ReleaseOutcome,
	type RunGuard,
	type RunLock,
	type RunLockEvents,
	type StaleLockReclaimed,
} from "./types.js";
