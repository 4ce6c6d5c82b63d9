/**
 * Signal operations: the state changes an operator or an upstream signal
 * service asks for between scheduled checks. Each is pure over a snapshot;
 * the CLI runs them inside a GuardedSession.
 */

import type { EngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { type Direction, adverseOffset } from "../shared/direction.js";
import type { InvalidTransitionError } from "../shared/errors.js";
import type { PositionId } from "../shared/identifiers.js";
import { newPositionId, ticker } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { isHolding, isTerminal, transition } from "../position/lifecycle.js";
import type {
	Entry,
	ExitOrder,
	ExitReason,
	PortfolioSnapshot,
	Position,
	TurtleSystem,
} from "../position/types.js";
import { MatchConfidence, PositionStatus } from "../position/types.js";
import type { UnitQuantitySource } from "../pyramid/types.js";
import type { RiskManager } from "../risk/risk-manager.js";
import type { LimitViolation } from "../risk/types.js";

export interface SignalContext {
	readonly risk: RiskManager;
	readonly sizer: UnitQuantitySource;
	readonly config: Pick<EngineConfig, "pyramid" | "fills">;
	readonly nowMs: number;
}

/** A confirmed breakout, as reported by the indicator side. */
export interface EntrySignal {
	readonly symbol: string;
	readonly system: TurtleSystem;
	readonly direction: Direction;
	readonly price: Decimal;
	readonly n: Decimal;
	/** Overrides the sized unit */
	readonly quantity?: Decimal | undefined;
}

export type ResolveAction = "discard" | "retry";

export type SignalRejection =
	| { readonly kind: "invalid_signal"; readonly reason: string }
	| { readonly kind: "duplicate"; readonly existing: PositionId; readonly reason: string }
	| { readonly kind: "zero_size"; readonly reason: string }
	| { readonly kind: "risk_limit"; readonly violation: LimitViolation; readonly reason: string }
	| { readonly kind: "not_found"; readonly reason: string }
	| { readonly kind: "nothing_to_resolve"; readonly reason: string }
	| {
			readonly kind: "invalid_transition";
			readonly error: InvalidTransitionError;
			readonly reason: string;
	  };

export interface SignalOutcome {
	readonly snapshot: PortfolioSnapshot;
	readonly position: Position;
}

/** Insert or replace a position by id. */
export function withPosition(snapshot: PortfolioSnapshot, position: Position): PortfolioSnapshot {
	const exists = snapshot.positions.some((p) => p.id === position.id);
	return {
		...snapshot,
		positions: exists
			? snapshot.positions.map((p) => (p.id === position.id ? position : p))
			: [...snapshot.positions, position],
	};
}

/**
 * Move a holding position to `closing` with an exit order. An entry still
 * waiting for its fill is dropped; its order is expected to be cancelled.
 */
export function beginExit(
	position: Position,
	reason: ExitReason,
	price: Decimal,
	nowMs: number,
	windowMs: number,
): Result<Position, InvalidTransitionError> {
	const exit: ExitOrder = {
		reason,
		intendedPrice: price,
		window: { startMs: nowMs, endMs: nowMs + windowMs },
		requestedAtMs: nowMs,
		fill: null,
		confidence: null,
	};
	return transition(position, PositionStatus.Closing, nowMs, {
		entries: position.entries.filter((e) => e.fill !== null),
		exit,
	});
}

/**
 * Turn a confirmed breakout into a `pending_entry` position holding entry 0.
 * The unit is risk-validated now; its fill is later settled without
 * re-validation.
 */
export function registerEntry(
	snapshot: PortfolioSnapshot,
	signal: EntrySignal,
	ctx: SignalContext,
): Result<SignalOutcome, SignalRejection> {
	if (!signal.price.isPositive() || !signal.n.isPositive()) {
		return err({
			kind: "invalid_signal",
			reason: `price and N must be positive (price ${signal.price.toString()}, N ${signal.n.toString()})`,
		});
	}

	const symbol = ticker(signal.symbol);
	const duplicate = snapshot.positions.find(
		(p) => p.symbol === symbol && p.system === signal.system && !isTerminal(p.status),
	);
	if (duplicate !== undefined) {
		return err({
			kind: "duplicate",
			existing: duplicate.id,
			reason: `${symbol} system ${signal.system} already has position ${duplicate.id} (${duplicate.status})`,
		});
	}

	const quantity = signal.quantity ?? ctx.sizer.unitQuantity(symbol, signal.n);
	if (!quantity.isPositive()) {
		return err({ kind: "zero_size", reason: `unit size for ${symbol} rounds to zero` });
	}

	const group = ctx.risk.groupOf(symbol);
	const verdict = ctx.risk.validate(snapshot, {
		positionId: null,
		symbol,
		direction: signal.direction,
		group,
		nAtEntry: signal.n,
	});
	if (!verdict.ok) {
		return err({ kind: "risk_limit", violation: verdict.error, reason: verdict.error.reason });
	}

	const { nowMs } = ctx;
	const entry: Entry = {
		unitIndex: 0,
		intendedPrice: signal.price,
		window: { startMs: nowMs, endMs: nowMs + ctx.config.fills.entryWindowMs },
		quantity,
		nAtEntry: signal.n,
		fill: null,
		confidence: null,
		createdAtMs: nowMs,
	};
	const stopDistance = signal.n.mul(Decimal.from(ctx.config.pyramid.stopDistanceN));
	const position: Position = {
		id: newPositionId(symbol, signal.system, signal.direction, nowMs),
		symbol,
		system: signal.system,
		direction: signal.direction,
		status: PositionStatus.PendingEntry,
		group,
		entryPrice: signal.price,
		stopLoss: adverseOffset(signal.direction, signal.price, stopDistance),
		maxUnits: ctx.config.pyramid.maxUnits,
		entries: [entry],
		exit: null,
		realizedPnl: Decimal.zero(),
		unrealizedPnl: Decimal.zero(),
		lastPrice: null,
		createdAtMs: nowMs,
		openedAtMs: null,
		updatedAtMs: nowMs,
		closedAtMs: null,
	};
	return ok({ snapshot: withPosition(snapshot, position), position });
}

/** Ask for a holding position to be closed; its exit fill is settled by later checks. */
export function requestExit(
	snapshot: PortfolioSnapshot,
	id: string,
	price: Decimal,
	reason: ExitReason,
	ctx: Pick<SignalContext, "config" | "nowMs">,
): Result<SignalOutcome, SignalRejection> {
	const position = snapshot.positions.find((p) => p.id === id);
	if (position === undefined) {
		return err({ kind: "not_found", reason: `no active position ${id}` });
	}
	if (!price.isPositive()) {
		return err({ kind: "invalid_signal", reason: `exit price must be positive, got ${price.toString()}` });
	}
	const closing = beginExit(position, reason, price, ctx.nowMs, ctx.config.fills.entryWindowMs);
	if (!closing.ok) {
		return err({ kind: "invalid_transition", error: closing.error, reason: closing.error.message });
	}
	return ok({ snapshot: withPosition(snapshot, closing.value), position: closing.value });
}

/**
 * Manual resolution of the entry still lacking a fill.
 * `retry` reopens its window from now; `discard` drops it, or discards the
 * whole position when it is the opening unit. A stop tightened for the
 * dropped unit stays where it is.
 */
export function resolveEntry(
	snapshot: PortfolioSnapshot,
	id: string,
	action: ResolveAction,
	ctx: Pick<SignalContext, "config" | "nowMs">,
): Result<SignalOutcome, SignalRejection> {
	const position = snapshot.positions.find((p) => p.id === id);
	if (position === undefined) {
		return err({ kind: "not_found", reason: `no active position ${id}` });
	}
	const entry = position.entries.find((e) => e.fill === null);
	if (entry === undefined) {
		return err({ kind: "nothing_to_resolve", reason: `position ${id} has no unfilled entry` });
	}

	const { nowMs } = ctx;
	let next: Position;
	if (action === "retry") {
		const reopened: Entry = {
			...entry,
			window: { startMs: nowMs, endMs: nowMs + ctx.config.fills.entryWindowMs },
			confidence: null,
		};
		next = {
			...position,
			entries: position.entries.map((e) => (e.unitIndex === entry.unitIndex ? reopened : e)),
			updatedAtMs: nowMs,
		};
	} else if (position.status === PositionStatus.PendingEntry) {
		const discarded = transition(position, PositionStatus.Discarded, nowMs, {
			entries: [{ ...entry, confidence: MatchConfidence.Unmatched }],
		});
		if (!discarded.ok) {
			return err({ kind: "invalid_transition", error: discarded.error, reason: discarded.error.message });
		}
		next = discarded.value;
	} else if (isHolding(position.status)) {
		next = {
			...position,
			entries: position.entries.filter((e) => e.unitIndex !== entry.unitIndex),
			updatedAtMs: nowMs,
		};
	} else {
		return err({
			kind: "nothing_to_resolve",
			reason: `position ${id} is ${position.status}; nothing to discard`,
		});
	}
	return ok({ snapshot: withPosition(snapshot, next), position: next });
}
