/**
 * FilePositionStore: JSON snapshot plus JSONL archive under one data directory.
 *
 *   <dataDir>/positions.json          current snapshot
 *   <dataDir>/archive.jsonl           one closed/discarded position per line
 *   <dataDir>/backups/positions-*.json  previous snapshots, newest `maxBackups` kept
 *
 * Saves write a temp file beside the target, fsync it and rename it over the
 * target, so a crash mid-write leaves either the old or the new file.
 */

import { randomBytes } from "node:crypto";
import {
	appendFile,
	copyFile,
	mkdir,
	open,
	readFile,
	readdir,
	rename,
	unlink,
} from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { PortfolioSnapshot, Position } from "../position/types.js";
import { emptySnapshot } from "../position/types.js";
import { CorruptStateError, SystemError, isNodeError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, toIso } from "../shared/time.js";
import {
	decodePosition,
	encodePosition,
	parseSnapshot,
	serializeSnapshot,
} from "./snapshot-codec.js";
import type {
	ArchiveContents,
	ArchiveOutcome,
	CorruptLine,
	PositionStore,
	RestoredBackup,
} from "./types.js";

export const SNAPSHOT_FILE = "positions.json";
export const ARCHIVE_FILE = "archive.jsonl";
export const BACKUP_DIR = "backups";

const BACKUP_PREFIX = "positions-";

export interface FilePositionStoreConfig {
	readonly dataDir: string;
	readonly maxBackups: number;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class FilePositionStore implements PositionStore {
	private readonly dataDir: string;
	private readonly maxBackups: number;
	private readonly clock: Clock;
	private readonly logger: Logger;

	private constructor(config: FilePositionStoreConfig) {
		this.dataDir = config.dataDir;
		this.maxBackups = config.maxBackups;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? silentLogger()).child({ component: "position-store" });
	}

	static create(config: FilePositionStoreConfig): FilePositionStore {
		return new FilePositionStore(config);
	}

	get snapshotPath(): string {
		return join(this.dataDir, SNAPSHOT_FILE);
	}

	get archivePath(): string {
		return join(this.dataDir, ARCHIVE_FILE);
	}

	get backupDir(): string {
		return join(this.dataDir, BACKUP_DIR);
	}

	async load(): Promise<Result<PortfolioSnapshot, CorruptStateError>> {
		let text: string;
		try {
			text = await readFile(this.snapshotPath, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") {
				return ok(emptySnapshot());
			}
			return err(
				new CorruptStateError(`Snapshot ${this.snapshotPath} cannot be read`, {
					source: this.snapshotPath,
					cause: e,
				}),
			);
		}
		return parseSnapshot(text, this.snapshotPath);
	}

	async save(snapshot: PortfolioSnapshot): Promise<Result<void, SystemError>> {
		try {
			await mkdir(this.dataDir, { recursive: true });
			await this.backupCurrent();
			await this.writeAtomic(this.snapshotPath, serializeSnapshot(snapshot));
			this.logger.debug({ positions: snapshot.positions.length }, "snapshot saved");
			return ok(undefined);
		} catch (e: unknown) {
			return err(ioError(`Saving snapshot to ${this.snapshotPath} failed`, e));
		}
	}

	async appendArchive(position: Position): Promise<Result<ArchiveOutcome, SystemError>> {
		const existing = await this.archivedIds();
		if (!existing.ok) return existing;
		if (existing.value.has(position.id)) {
			this.logger.debug({ positionId: position.id }, "position already archived");
			return ok("already_archived");
		}
		try {
			await mkdir(this.dataDir, { recursive: true });
			const line = JSON.stringify({
				archivedAt: toIso(this.clock.now()),
				position: encodePosition(position),
			});
			await appendFile(this.archivePath, `${line}\n`, "utf-8");
			return ok("appended");
		} catch (e: unknown) {
			return err(ioError(`Appending to ${this.archivePath} failed`, e));
		}
	}

	/** Corrupt lines are reported beside the positions rather than dropped. */
	async readArchive(): Promise<Result<ArchiveContents, SystemError>> {
		let content: string;
		try {
			content = await readFile(this.archivePath, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") {
				return ok({ positions: [], corruptLines: [] });
			}
			return err(ioError(`Reading ${this.archivePath} failed`, e));
		}

		const positions: Position[] = [];
		const corruptLines: CorruptLine[] = [];
		const lines = content.split("\n");
		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) continue;
			const decoded = decodeArchiveLine(trimmed);
			if (decoded.ok) {
				positions.push(decoded.value);
			} else {
				corruptLines.push({
					lineNumber: i + 1,
					raw: trimmed.slice(0, 200),
					problems: decoded.error,
				});
			}
		}
		return ok({ positions, corruptLines });
	}

	async restoreLatestBackup(): Promise<Result<RestoredBackup, CorruptStateError | SystemError>> {
		let names: string[];
		try {
			names = await this.listBackups();
		} catch (e: unknown) {
			return err(ioError(`Listing ${this.backupDir} failed`, e));
		}

		const rejected: string[] = [];
		for (const name of [...names].reverse()) {
			const source = join(this.backupDir, name);
			let text: string;
			try {
				text = await readFile(source, "utf-8");
			} catch (e: unknown) {
				return err(ioError(`Reading backup ${source} failed`, e));
			}
			const parsed = parseSnapshot(text, source);
			if (!parsed.ok) {
				rejected.push(name);
				this.logger.warn({ source, error: parsed.error }, "backup rejected");
				continue;
			}
			try {
				await this.quarantineCurrent();
				await this.writeAtomic(this.snapshotPath, text);
			} catch (e: unknown) {
				return err(ioError(`Restoring backup ${source} failed`, e));
			}
			this.logger.warn({ source }, "snapshot restored from backup");
			return ok({ source, snapshot: parsed.value });
		}

		return err(
			new CorruptStateError("No valid backup to restore", {
				source: this.backupDir,
				issues: rejected.map((name) => `${name}: invalid`),
			}),
		);
	}

	// ── Internals ──────────────────────────────────────────────────

	private async archivedIds(): Promise<Result<Set<string>, SystemError>> {
		const archive = await this.readArchive();
		if (!archive.ok) return archive;
		const ids = new Set<string>(archive.value.positions.map((p) => p.id));
		// A line that no longer decodes still claims its id.
		for (const line of archive.value.corruptLines) {
			const id = /"id":"([^"]+)"/.exec(line.raw)?.[1];
			if (id !== undefined) ids.add(id);
		}
		return ok(ids);
	}

	private async backupCurrent(): Promise<void> {
		await mkdir(this.backupDir, { recursive: true });
		const target = join(this.backupDir, `${BACKUP_PREFIX}${stamp(this.clock.now())}.json`);
		try {
			await copyFile(this.snapshotPath, target);
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") return;
			throw e;
		}
		await this.pruneBackups();
	}

	private async pruneBackups(): Promise<void> {
		const names = await this.listBackups();
		const excess = names.length - this.maxBackups;
		for (const name of names.slice(0, Math.max(0, excess))) {
			await unlink(join(this.backupDir, name));
		}
	}

	/** Backup file names, oldest first. */
	private async listBackups(): Promise<string[]> {
		try {
			const names = await readdir(this.backupDir);
			return names.filter((n) => n.startsWith(BACKUP_PREFIX) && n.endsWith(".json")).sort();
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") return [];
			throw e;
		}
	}

	/** Keep the rejected snapshot beside the data for inspection. */
	private async quarantineCurrent(): Promise<void> {
		try {
			await rename(this.snapshotPath, `${this.snapshotPath}.corrupt-${stamp(this.clock.now())}`);
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") return;
			throw e;
		}
	}

	private async writeAtomic(target: string, content: string): Promise<void> {
		const tmp = `${target}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
		const handle = await open(tmp, "wx");
		try {
			await handle.writeFile(content, "utf-8");
			await handle.sync();
		} finally {
			await handle.close();
		}
		try {
			await rename(tmp, target);
		} catch (e: unknown) {
			await unlink(tmp).catch((cleanup: unknown) => {
				this.logger.warn({ error: cleanup, tmp }, "temp file cleanup failed");
			});
			throw e;
		}
	}
}

function decodeArchiveLine(line: string): Result<Position, string[]> {
	let data: unknown;
	try {
		data = JSON.parse(line);
	} catch {
		return err(["not valid JSON"]);
	}
	if (typeof data !== "object" || data === null || !("position" in data)) {
		return err(["missing position"]);
	}
	return decodePosition(data.position);
}

/** Sortable, filename-safe UTC stamp: 20241019T120000123Z */
function stamp(ms: number): string {
	return toIso(ms).replace(/[-:.]/g, "");
}

function ioError(message: string, cause: unknown): SystemError {
	const code = isNodeError(cause) ? cause.code : undefined;
	const detail = cause instanceof Error ? cause.message : String(cause);
	return new SystemError(`${message}: ${detail}`, { code, cause });
}
