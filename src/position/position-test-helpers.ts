/**
 * Shared builders for position-shaped test data.
 */

import { Decimal } from "../shared/decimal.js";
import { Direction, adverseOffset } from "../shared/direction.js";
import { orderRef, positionId, ticker } from "../shared/identifiers.js";
import {
	type Entry,
	MatchConfidence,
	type PortfolioSnapshot,
	type Position,
	PositionStatus,
	SNAPSHOT_VERSION,
	type TimeWindow,
	type TurtleSystem,
} from "./types.js";

export const T0 = 1_700_000_000_000;
export const d = Decimal.from;

export interface PositionShape {
	readonly symbol?: string;
	readonly id?: string;
	readonly system?: TurtleSystem;
	readonly direction?: Direction;
	readonly status?: PositionStatus;
	readonly group?: string;
	/** Fill price of each filled unit, in unit order */
	readonly fills?: readonly string[];
	readonly n?: string;
	readonly quantity?: string;
	readonly stopLoss?: string;
	readonly maxUnits?: number;
	/** A trailing entry without a fill */
	readonly open?: {
		readonly price: string;
		readonly window?: TimeWindow | null;
		readonly unmatched?: boolean;
	};
}

export function filledEntry(
	unitIndex: number,
	price: string,
	n: string,
	quantity = "10",
	symbol = "AAPL",
): Entry {
	return {
		unitIndex,
		intendedPrice: d(price),
		window: { startMs: T0 + unitIndex * 60_000, endMs: T0 + unitIndex * 60_000 + 3_600_000 },
		quantity: d(quantity),
		nAtEntry: d(n),
		fill: {
			price: d(price),
			quantity: d(quantity),
			executedAtMs: T0 + unitIndex * 60_000 + 1_000,
			orderRef: orderRef(`ord-${symbol}-${unitIndex}`),
		},
		confidence: MatchConfidence.Exact,
		createdAtMs: T0 + unitIndex * 60_000,
	};
}

export function openEntry(
	unitIndex: number,
	price: string,
	n: string,
	options: { window?: TimeWindow | null; unmatched?: boolean; quantity?: string } = {},
): Entry {
	return {
		unitIndex,
		intendedPrice: d(price),
		window:
			options.window === undefined
				? { startMs: T0 + unitIndex * 60_000, endMs: T0 + unitIndex * 60_000 + 3_600_000 }
				: options.window,
		quantity: d(options.quantity ?? "10"),
		nAtEntry: d(n),
		fill: null,
		confidence: options.unmatched === true ? MatchConfidence.Unmatched : null,
		createdAtMs: T0 + unitIndex * 60_000,
	};
}

export function buildPosition(shape: PositionShape = {}): Position {
	const symbol = shape.symbol ?? "AAPL";
	const direction = shape.direction ?? Direction.Long;
	const n = shape.n ?? "2";
	const quantity = shape.quantity ?? "10";
	const fills = shape.fills ?? ["100"];
	const entries: Entry[] = fills.map((price, i) => filledEntry(i, price, n, quantity, symbol));
	if (shape.open !== undefined) {
		entries.push(
			openEntry(entries.length, shape.open.price, n, {
				window: shape.open.window,
				unmatched: shape.open.unmatched,
				quantity,
			}),
		);
	}
	const first = entries[0];
	const entryPrice = first?.fill?.price ?? first?.intendedPrice ?? d("100");
	const status =
		shape.status ??
		(fills.length === 0
			? PositionStatus.PendingEntry
			: entries.length > 1
				? PositionStatus.Pyramiding
				: PositionStatus.Open);
	return {
		id: positionId(shape.id ?? `${symbol}-s${shape.system ?? 1}-${direction}-test`),
		symbol: ticker(symbol),
		system: shape.system ?? 1,
		direction,
		status,
		group: shape.group ?? "default",
		entryPrice,
		stopLoss:
			shape.stopLoss !== undefined
				? d(shape.stopLoss)
				: adverseOffset(direction, entryPrice, d(n).mul(d(2))),
		maxUnits: shape.maxUnits ?? 4,
		entries,
		exit: null,
		realizedPnl: Decimal.zero(),
		unrealizedPnl: Decimal.zero(),
		lastPrice: null,
		createdAtMs: T0,
		openedAtMs: fills.length > 0 ? T0 + 1_000 : null,
		updatedAtMs: T0 + 1_000,
		closedAtMs: null,
	};
}

export function snapshotOf(...positions: Position[]): PortfolioSnapshot {
	return { version: SNAPSHOT_VERSION, savedAtMs: T0, positions, backoff: {} };
}
