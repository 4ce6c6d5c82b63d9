/**
 * Snapshot codec: the persisted JSON shape of a PortfolioSnapshot.
 *
 * Decimals are stored as canonical strings and times as UTC ISO-8601 so the
 * file is readable by hand. Decoding validates the schema with zod and then
 * the cross-field invariants; any failure is a CorruptStateError listing every
 * problem found. Nothing is dropped or repaired.
 */

import { z, validate, formatIssue } from "../lib/validation/index.js";
import { isTerminal } from "../position/lifecycle.js";
import {
	type BackoffState,
	type Entry,
	type ExitOrder,
	type MatchedFill,
	MatchConfidence,
	type PortfolioSnapshot,
	type Position,
	PositionStatus,
	SNAPSHOT_VERSION,
	type TimeWindow,
} from "../position/types.js";
import { Decimal } from "../shared/decimal.js";
import { Direction } from "../shared/direction.js";
import { CorruptStateError } from "../shared/errors.js";
import { orderRef, positionId, ticker } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { parseIso, toIso } from "../shared/time.js";

// ── Field schemas ────────────────────────────────────────────────────

const decimal = z.string().transform((value, ctx) => {
	if (!Decimal.isDecimalString(value)) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a decimal: "${value}"` });
		return z.NEVER;
	}
	return Decimal.from(value);
});

const timestamp = z.string().transform((value, ctx) => {
	const ms = parseIso(value);
	if (ms === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not an ISO timestamp: "${value}"` });
		return z.NEVER;
	}
	return ms;
});

const windowSchema = z
	.object({ start: timestamp, end: timestamp })
	.strict()
	.transform((w): TimeWindow => ({ startMs: w.start, endMs: w.end }));

const fillSchema = z
	.object({
		price: decimal,
		quantity: decimal,
		executedAt: timestamp.nullable(),
		orderRef: z.string().trim().min(1).transform(orderRef),
	})
	.strict()
	.transform(
		(f): MatchedFill => ({
			price: f.price,
			quantity: f.quantity,
			executedAtMs: f.executedAt,
			orderRef: f.orderRef,
		}),
	);

const confidenceSchema = z.enum([
	MatchConfidence.Exact,
	MatchConfidence.TimeFiltered,
	MatchConfidence.PriceOnly,
	MatchConfidence.Unmatched,
]);

const entrySchema = z
	.object({
		unitIndex: z.number().int().nonnegative(),
		intendedPrice: decimal,
		window: windowSchema.nullable(),
		quantity: decimal,
		nAtEntry: decimal,
		fill: fillSchema.nullable(),
		confidence: confidenceSchema.nullable(),
		createdAt: timestamp,
	})
	.strict()
	.transform(
		(e): Entry => ({
			unitIndex: e.unitIndex,
			intendedPrice: e.intendedPrice,
			window: e.window,
			quantity: e.quantity,
			nAtEntry: e.nAtEntry,
			fill: e.fill,
			confidence: e.confidence,
			createdAtMs: e.createdAt,
		}),
	);

const exitSchema = z
	.object({
		reason: z.enum(["stop_loss", "exit_signal", "manual"]),
		intendedPrice: decimal,
		window: windowSchema.nullable(),
		requestedAt: timestamp,
		fill: fillSchema.nullable(),
		confidence: confidenceSchema.nullable(),
	})
	.strict()
	.transform(
		(x): ExitOrder => ({
			reason: x.reason,
			intendedPrice: x.intendedPrice,
			window: x.window,
			requestedAtMs: x.requestedAt,
			fill: x.fill,
			confidence: x.confidence,
		}),
	);

const positionSchema = z
	.object({
		id: z.string().trim().min(1).transform(positionId),
		symbol: z.string().trim().min(1).transform(ticker),
		system: z.union([z.literal(1), z.literal(2)]),
		direction: z.enum([Direction.Long, Direction.Short]),
		status: z.enum([
			PositionStatus.PendingEntry,
			PositionStatus.Open,
			PositionStatus.Pyramiding,
			PositionStatus.Closing,
			PositionStatus.Closed,
			PositionStatus.Discarded,
		]),
		group: z.string().min(1),
		entryPrice: decimal,
		stopLoss: decimal,
		maxUnits: z.number().int().positive(),
		entries: z.array(entrySchema),
		exit: exitSchema.nullable(),
		realizedPnl: decimal,
		unrealizedPnl: decimal,
		lastPrice: decimal.nullable(),
		createdAt: timestamp,
		openedAt: timestamp.nullable(),
		updatedAt: timestamp,
		closedAt: timestamp.nullable(),
	})
	.strict()
	.transform(
		(p): Position => ({
			id: p.id,
			symbol: p.symbol,
			system: p.system,
			direction: p.direction,
			status: p.status,
			group: p.group,
			entryPrice: p.entryPrice,
			stopLoss: p.stopLoss,
			maxUnits: p.maxUnits,
			entries: p.entries,
			exit: p.exit,
			realizedPnl: p.realizedPnl,
			unrealizedPnl: p.unrealizedPnl,
			lastPrice: p.lastPrice,
			createdAtMs: p.createdAt,
			openedAtMs: p.openedAt,
			updatedAtMs: p.updatedAt,
			closedAtMs: p.closedAt,
		}),
	);

const backoffSchema = z
	.object({
		failures: z.number().int().positive(),
		retryAfter: timestamp,
		lastError: z.string(),
	})
	.strict()
	.transform(
		(b): BackoffState => ({
			failures: b.failures,
			retryAfterMs: b.retryAfter,
			lastError: b.lastError,
		}),
	);

const snapshotSchema = z
	.object({
		version: z.literal(SNAPSHOT_VERSION),
		savedAt: timestamp.nullable(),
		positions: z.array(positionSchema),
		backoff: z.record(backoffSchema),
	})
	.strict();

// ── Encoding ─────────────────────────────────────────────────────────

export type EncodedWindow = { start: string; end: string };

function encodeWindow(w: TimeWindow | null): EncodedWindow | null {
	return w === null ? null : { start: toIso(w.startMs), end: toIso(w.endMs) };
}

function encodeFill(f: MatchedFill | null): Record<string, unknown> | null {
	if (f === null) return null;
	return {
		price: f.price.toString(),
		quantity: f.quantity.toString(),
		executedAt: f.executedAtMs === null ? null : toIso(f.executedAtMs),
		orderRef: f.orderRef,
	};
}

function encodeEntry(e: Entry): Record<string, unknown> {
	return {
		unitIndex: e.unitIndex,
		intendedPrice: e.intendedPrice.toString(),
		window: encodeWindow(e.window),
		quantity: e.quantity.toString(),
		nAtEntry: e.nAtEntry.toString(),
		fill: encodeFill(e.fill),
		confidence: e.confidence,
		createdAt: toIso(e.createdAtMs),
	};
}

function encodeExit(x: ExitOrder | null): Record<string, unknown> | null {
	if (x === null) return null;
	return {
		reason: x.reason,
		intendedPrice: x.intendedPrice.toString(),
		window: encodeWindow(x.window),
		requestedAt: toIso(x.requestedAtMs),
		fill: encodeFill(x.fill),
		confidence: x.confidence,
	};
}

/** Persisted form of one position; also the archive line payload. */
export function encodePosition(p: Position): Record<string, unknown> {
	return {
		id: p.id,
		symbol: p.symbol,
		system: p.system,
		direction: p.direction,
		status: p.status,
		group: p.group,
		entryPrice: p.entryPrice.toString(),
		stopLoss: p.stopLoss.toString(),
		maxUnits: p.maxUnits,
		entries: p.entries.map(encodeEntry),
		exit: encodeExit(p.exit),
		realizedPnl: p.realizedPnl.toString(),
		unrealizedPnl: p.unrealizedPnl.toString(),
		lastPrice: p.lastPrice === null ? null : p.lastPrice.toString(),
		createdAt: toIso(p.createdAtMs),
		openedAt: p.openedAtMs === null ? null : toIso(p.openedAtMs),
		updatedAt: toIso(p.updatedAtMs),
		closedAt: p.closedAtMs === null ? null : toIso(p.closedAtMs),
	};
}

export interface EncodedSnapshot {
	readonly version: number;
	readonly savedAt: string | null;
	readonly positions: Record<string, unknown>[];
	readonly backoff: Record<string, unknown>;
}

export function encodeSnapshot(snapshot: PortfolioSnapshot): EncodedSnapshot {
	const backoff: Record<string, unknown> = {};
	for (const [symbol, state] of Object.entries(snapshot.backoff)) {
		backoff[symbol] = {
			failures: state.failures,
			retryAfter: toIso(state.retryAfterMs),
			lastError: state.lastError,
		};
	}
	return {
		version: snapshot.version,
		savedAt: snapshot.savedAtMs === null ? null : toIso(snapshot.savedAtMs),
		positions: snapshot.positions.map(encodePosition),
		backoff,
	};
}

/** Pretty-printed file body, newline-terminated. */
export function serializeSnapshot(snapshot: PortfolioSnapshot): string {
	return `${JSON.stringify(encodeSnapshot(snapshot), null, 2)}\n`;
}

// ── Decoding ─────────────────────────────────────────────────────────

/** Cross-field rules the schema alone cannot express. Returns one message per violation. */
export function checkPositionInvariants(p: Position): string[] {
	const problems: string[] = [];
	const where = `position ${p.id}`;

	p.entries.forEach((entry, i) => {
		if (entry.unitIndex !== i) {
			problems.push(
				`${where}: unit indices must be contiguous from 0 (found ${entry.unitIndex} at ${i})`,
			);
		}
		const unmatched = entry.confidence === MatchConfidence.Unmatched;
		if (entry.fill !== null && (entry.confidence === null || unmatched)) {
			problems.push(`${where}: unit ${i} has a fill but confidence ${String(entry.confidence)}`);
		}
		if (entry.fill === null && entry.confidence !== null && !unmatched) {
			problems.push(`${where}: unit ${i} has confidence ${entry.confidence} but no fill`);
		}
		if (entry.fill === null && i !== p.entries.length - 1) {
			problems.push(`${where}: only the newest unit may lack a fill (unit ${i})`);
		}
	});

	if (p.entries.length > p.maxUnits) {
		problems.push(`${where}: ${p.entries.length} units exceed max units ${p.maxUnits}`);
	}

	const filled = p.entries.filter((e) => e.fill !== null).length;
	if (p.status === PositionStatus.PendingEntry) {
		if (filled > 0) problems.push(`${where}: pending_entry position has filled units`);
		if (p.entries.length !== 1) {
			problems.push(`${where}: pending_entry position must have exactly one entry`);
		}
	} else if (filled === 0 && !isTerminal(p.status)) {
		problems.push(`${where}: ${p.status} position has no filled unit`);
	}

	if (p.status === PositionStatus.Closing && p.exit === null) {
		problems.push(`${where}: closing position has no exit order`);
	}
	if (p.exit !== null && p.status !== PositionStatus.Closing && p.status !== PositionStatus.Closed) {
		problems.push(`${where}: ${p.status} position carries an exit order`);
	}
	return problems;
}

function checkSnapshotInvariants(snapshot: PortfolioSnapshot): string[] {
	const problems: string[] = [];
	const seen = new Set<string>();
	for (const p of snapshot.positions) {
		if (seen.has(p.id)) problems.push(`duplicate position id ${p.id}`);
		seen.add(p.id);
		if (isTerminal(p.status)) {
			problems.push(`position ${p.id}: ${p.status} position in the active set`);
		}
		problems.push(...checkPositionInvariants(p));
	}
	return problems;
}

/** Validate and decode a parsed snapshot document. */
export function decodeSnapshot(
	data: unknown,
	source: string,
): Result<PortfolioSnapshot, CorruptStateError> {
	const parsed = validate(snapshotSchema, data);
	if (!parsed.ok) {
		const issues = parsed.error.issues.map(formatIssue);
		return err(
			new CorruptStateError(`Snapshot ${source} fails schema validation`, {
				source,
				issues,
				cause: parsed.error,
			}),
		);
	}
	const snapshot: PortfolioSnapshot = {
		version: parsed.value.version,
		savedAtMs: parsed.value.savedAt,
		positions: parsed.value.positions,
		backoff: parsed.value.backoff,
	};
	const problems = checkSnapshotInvariants(snapshot);
	if (problems.length > 0) {
		return err(
			new CorruptStateError(`Snapshot ${source} violates invariants`, { source, issues: problems }),
		);
	}
	return ok(snapshot);
}

/** Parse a snapshot file body. */
export function parseSnapshot(
	text: string,
	source: string,
): Result<PortfolioSnapshot, CorruptStateError> {
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (e) {
		return err(
			new CorruptStateError(`Snapshot ${source} is not valid JSON`, {
				source,
				issues: [e instanceof Error ? e.message : String(e)],
				cause: e,
			}),
		);
	}
	return decodeSnapshot(data, source);
}

/** Decode one archived position (archive lines hold closed/discarded positions). */
export function decodePosition(data: unknown): Result<Position, string[]> {
	const parsed = validate(positionSchema, data);
	if (!parsed.ok) return err(parsed.error.issues.map(formatIssue));
	const problems = checkPositionInvariants(parsed.value);
	return problems.length > 0 ? err(problems) : ok(parsed.value);
}
