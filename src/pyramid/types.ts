import type { Decimal } from "../shared/decimal.js";
import type { PositionId } from "../shared/identifiers.js";

/** A unit the Pyramid Manager would add; not persisted until risk approves and it is committed. */
export interface PyramidCandidate {
	readonly positionId: PositionId;
	readonly unitIndex: number;
	readonly intendedPrice: Decimal;
	readonly quantity: Decimal;
	readonly nAtEntry: Decimal;
	/** Price the move had to reach: last fill ± interval × N */
	readonly trigger: Decimal;
	/** Protective stop after the addition, already tightened against the current one */
	readonly stopLoss: Decimal;
}

export const HoldReason = {
	NotHolding: "not_holding",
	OpenEntry: "open_entry",
	MaxUnits: "max_units",
	NoFilledUnit: "no_filled_unit",
	InvalidN: "invalid_n",
	InsufficientMove: "insufficient_move",
	ZeroSize: "zero_size",
} as const;

export type HoldReason = (typeof HoldReason)[keyof typeof HoldReason];

export type PyramidDecision =
	| { readonly type: "propose"; readonly candidate: PyramidCandidate }
	| { readonly type: "hold"; readonly reason: HoldReason; readonly detail: string };

/** Quantity for one unit of a symbol at a given N. */
export interface UnitQuantitySource {
	unitQuantity(symbol: string, n: Decimal): Decimal;
}
