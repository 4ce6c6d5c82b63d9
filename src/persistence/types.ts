import type { PortfolioSnapshot, Position } from "../position/types.js";
import type { CorruptStateError, SystemError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/** A line in the archive that could not be decoded as a position. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
	readonly problems: readonly string[];
}

export interface ArchiveContents {
	readonly positions: readonly Position[];
	readonly corruptLines: readonly CorruptLine[];
}

export type ArchiveOutcome = "appended" | "already_archived";

export interface RestoredBackup {
	readonly source: string;
	readonly snapshot: PortfolioSnapshot;
}

/**
 * Durable home of the portfolio snapshot and the archive of finished positions.
 * `load` never repairs; `restoreLatestBackup` is the only recovery path.
 */
export interface PositionStore {
	/** A missing snapshot is an empty one. */
	load(): Promise<Result<PortfolioSnapshot, CorruptStateError>>;
	/** Atomic replace. The previous snapshot is kept as a backup first. */
	save(snapshot: PortfolioSnapshot): Promise<Result<void, SystemError>>;
	/** Idempotent on position id. */
	appendArchive(position: Position): Promise<Result<ArchiveOutcome, SystemError>>;
	readArchive(): Promise<Result<ArchiveContents, SystemError>>;
	/** Replace the snapshot with the newest backup that decodes cleanly. */
	restoreLatestBackup(): Promise<Result<RestoredBackup, CorruptStateError | SystemError>>;
}
