/**
 * Position domain types.
 *
 * A Position is one directional exposure in one instrument under one Turtle
 * system. Its units are Entries; a unit only counts once a broker fill has
 * been matched to it.
 */

import type { Decimal } from "../shared/decimal.js";
import type { Direction } from "../shared/direction.js";
import type { OrderRef, PositionId, Ticker } from "../shared/identifiers.js";

// ── Enumerations ─────────────────────────────────────────────────────

export const PositionStatus = {
	/** Breakout confirmed, opening order placed, no fill matched yet */
	PendingEntry: "pending_entry",
	/** At least one unit filled, no pyramid unit committed yet */
	Open: "open",
	/** One or more pyramid units committed */
	Pyramiding: "pyramiding",
	/** Exit order placed, waiting for its fill */
	Closing: "closing",
	/** Exit fill matched; terminal */
	Closed: "closed",
	/** Opening order never filled inside its window; terminal */
	Discarded: "discarded",
} as const;

export type PositionStatus = (typeof PositionStatus)[keyof typeof PositionStatus];

export const MatchConfidence = {
	/** Only one candidate fill existed */
	Exact: "exact",
	/** Chosen among several by execution time against the window */
	TimeFiltered: "time_filtered",
	/** Chosen by closeness to the intended price (no usable times) */
	PriceOnly: "price_only",
	/** Window elapsed with no fill; blocks pyramiding until resolved */
	Unmatched: "unmatched",
} as const;

export type MatchConfidence = (typeof MatchConfidence)[keyof typeof MatchConfidence];

export const ExitReason = {
	StopLoss: "stop_loss",
	ExitSignal: "exit_signal",
	Manual: "manual",
} as const;

export type ExitReason = (typeof ExitReason)[keyof typeof ExitReason];

/** Turtle System 1 (20-day breakout) or System 2 (55-day breakout). */
export type TurtleSystem = 1 | 2;

// ── Records ──────────────────────────────────────────────────────────

export interface TimeWindow {
	readonly startMs: number;
	readonly endMs: number;
}

/** The broker fill an entry or exit was reconciled with. */
export interface MatchedFill {
	readonly price: Decimal;
	readonly quantity: Decimal;
	/** Null when the broker did not report an execution time */
	readonly executedAtMs: number | null;
	readonly orderRef: OrderRef;
}

export interface Entry {
	/** Contiguous from 0; 0 is the opening unit */
	readonly unitIndex: number;
	readonly intendedPrice: Decimal;
	readonly window: TimeWindow | null;
	readonly quantity: Decimal;
	/** N (ATR) at the time the unit was proposed; drives exposure */
	readonly nAtEntry: Decimal;
	readonly fill: MatchedFill | null;
	/** Null while the entry is awaiting its fill inside its window */
	readonly confidence: MatchConfidence | null;
	readonly createdAtMs: number;
}

export interface ExitOrder {
	readonly reason: ExitReason;
	readonly intendedPrice: Decimal;
	readonly window: TimeWindow | null;
	readonly requestedAtMs: number;
	readonly fill: MatchedFill | null;
	readonly confidence: MatchConfidence | null;
}

export interface Position {
	readonly id: PositionId;
	readonly symbol: Ticker;
	readonly system: TurtleSystem;
	readonly direction: Direction;
	readonly status: PositionStatus;
	readonly group: string;
	/** Intended price of unit 0 until it fills, then its fill price */
	readonly entryPrice: Decimal;
	readonly stopLoss: Decimal;
	readonly maxUnits: number;
	readonly entries: readonly Entry[];
	readonly exit: ExitOrder | null;
	readonly realizedPnl: Decimal;
	readonly unrealizedPnl: Decimal;
	readonly lastPrice: Decimal | null;
	readonly createdAtMs: number;
	readonly openedAtMs: number | null;
	readonly updatedAtMs: number;
	readonly closedAtMs: number | null;
}

// ── Snapshot ─────────────────────────────────────────────────────────

/** Per-symbol collaborator backoff carried between runs. */
export interface BackoffState {
	readonly failures: number;
	readonly retryAfterMs: number;
	readonly lastError: string;
}

export const SNAPSHOT_VERSION = 1;

/** The whole persisted state: every non-terminal position plus backoff bookkeeping. */
export interface PortfolioSnapshot {
	readonly version: typeof SNAPSHOT_VERSION;
	readonly savedAtMs: number | null;
	readonly positions: readonly Position[];
	readonly backoff: Readonly<Record<string, BackoffState>>;
}

export function emptySnapshot(): PortfolioSnapshot {
	return { version: SNAPSHOT_VERSION, savedAtMs: null, positions: [], backoff: {} };
}
