/**
 * Pure helpers over Position records. Nothing here mutates; every
 * "update" returns a new Position.
 */

import { Decimal } from "../shared/decimal.js";
import { directionalPnl } from "../shared/direction.js";
import type { Entry, Position } from "./types.js";
import { MatchConfidence } from "./types.js";

export type EntryState = "filled" | "pending" | "unmatched";

export function entryState(entry: Entry): EntryState {
	if (entry.fill !== null) return "filled";
	return entry.confidence === MatchConfidence.Unmatched ? "unmatched" : "pending";
}

export function filledEntries(position: Position): readonly Entry[] {
	return position.entries.filter((e) => e.fill !== null);
}

/** Units with a matched fill. */
export function unitCount(position: Position): number {
	return filledEntries(position).length;
}

/** Units filled or awaiting a fill; what the risk budget reserves for this position. */
export function reservedUnits(position: Position): number {
	return position.entries.length;
}

/** The most recently filled unit, or null before the opening fill. */
export function lastFilledEntry(position: Position): Entry | null {
	let last: Entry | null = null;
	for (const entry of position.entries) {
		if (entry.fill !== null && (last === null || entry.unitIndex > last.unitIndex)) last = entry;
	}
	return last;
}

/** The entry still waiting for its fill inside its window, if any. */
export function awaitingEntry(position: Position): Entry | null {
	return position.entries.find((e) => entryState(e) === "pending") ?? null;
}

/** True while any entry lacks a fill (pending or unmatched); blocks new pyramid units. */
export function hasOpenEntry(position: Position): boolean {
	return position.entries.some((e) => e.fill === null);
}

/** Total filled quantity. */
export function filledQuantity(position: Position): Decimal {
	return Decimal.sum(
		position.entries.flatMap((e) => (e.fill !== null ? [e.fill.quantity] : [])),
	);
}

/** Quantity-weighted average fill price; null before the opening fill. */
export function averageEntryPrice(position: Position): Decimal | null {
	const qty = filledQuantity(position);
	if (qty.isZero()) return null;
	const notional = Decimal.sum(
		position.entries.flatMap((e) => (e.fill !== null ? [e.fill.price.mul(e.fill.quantity)] : [])),
	);
	return notional.div(qty);
}

/** Σ N at entry across every entry, filled or reserved. */
export function nExposure(position: Position): Decimal {
	return Decimal.sum(position.entries.map((e) => e.nAtEntry));
}

/** P&L of every filled unit if it were closed at `price`. */
export function pnlAt(position: Position, price: Decimal): Decimal {
	return Decimal.sum(
		position.entries.flatMap((e) =>
			e.fill !== null
				? [directionalPnl(position.direction, e.fill.price, price, e.fill.quantity)]
				: [],
		),
	);
}

/** Record the latest mark price and the unrealized P&L it implies. Stops are not touched. */
export function markToMarket(position: Position, price: Decimal, nowMs: number): Position {
	return {
		...position,
		lastPrice: price,
		unrealizedPnl: pnlAt(position, price),
		updatedAtMs: nowMs,
	};
}

/** Replace one entry by unit index. */
export function replaceEntry(position: Position, entry: Entry): Position {
	return {
		...position,
		entries: position.entries.map((e) => (e.unitIndex === entry.unitIndex ? entry : e)),
	};
}
