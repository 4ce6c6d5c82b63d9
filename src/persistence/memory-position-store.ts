/**
 * MemoryPositionStore: in-process PositionStore for tests and dry runs.
 *
 * Holds the snapshot as serialized text so every load goes through the same
 * codec and invariant checks as the file store.
 */

import type { PortfolioSnapshot, Position } from "../position/types.js";
import { emptySnapshot } from "../position/types.js";
import { CorruptStateError, type SystemError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import {
	decodePosition,
	encodePosition,
	parseSnapshot,
	serializeSnapshot,
} from "./snapshot-codec.js";
import type { ArchiveContents, ArchiveOutcome, PositionStore, RestoredBackup } from "./types.js";

const SOURCE = "memory";

export class MemoryPositionStore implements PositionStore {
	private text: string | null;
	private readonly backups: string[] = [];
	private readonly archive: string[] = [];
	private saves = 0;

	constructor(initial?: PortfolioSnapshot) {
		this.text = initial === undefined ? null : serializeSnapshot(initial);
	}

	async load(): Promise<Result<PortfolioSnapshot, CorruptStateError>> {
		if (this.text === null) return ok(emptySnapshot());
		return parseSnapshot(this.text, SOURCE);
	}

	async save(snapshot: PortfolioSnapshot): Promise<Result<void, SystemError>> {
		if (this.text !== null) this.backups.push(this.text);
		this.text = serializeSnapshot(snapshot);
		this.saves += 1;
		return ok(undefined);
	}

	async appendArchive(position: Position): Promise<Result<ArchiveOutcome, SystemError>> {
		const contents = await this.readArchive();
		if (contents.ok && contents.value.positions.some((p) => p.id === position.id)) {
			return ok("already_archived");
		}
		this.archive.push(JSON.stringify(encodePosition(position)));
		return ok("appended");
	}

	async readArchive(): Promise<Result<ArchiveContents, SystemError>> {
		const positions: Position[] = [];
		for (const line of this.archive) {
			const decoded = decodePosition(JSON.parse(line));
			if (decoded.ok) positions.push(decoded.value);
		}
		return ok({ positions, corruptLines: [] });
	}

	async restoreLatestBackup(): Promise<Result<RestoredBackup, CorruptStateError | SystemError>> {
		for (let i = this.backups.length - 1; i >= 0; i--) {
			const text = this.backups[i];
			if (text === undefined) continue;
			const parsed = parseSnapshot(text, `${SOURCE}-backup-${i}`);
			if (parsed.ok) {
				this.text = text;
				return ok({ source: `${SOURCE}-backup-${i}`, snapshot: parsed.value });
			}
		}
		return err(new CorruptStateError("No valid backup to restore", { source: SOURCE }));
	}

	// ── Test inspection ────────────────────────────────────────────

	/** Overwrite the stored text verbatim, e.g. with a corrupt document. */
	setRaw(text: string): void {
		this.text = text;
	}

	raw(): string | null {
		return this.text;
	}

	get saveCount(): number {
		return this.saves;
	}

	get archiveSize(): number {
		return this.archive.length;
	}
}
