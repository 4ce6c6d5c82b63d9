import type { Decimal } from "../shared/decimal.js";
import type { FillSide } from "../shared/direction.js";
import type { OrderRef, Ticker } from "../shared/identifiers.js";
import type { MatchConfidence, TimeWindow } from "../position/types.js";

/** A broker execution as reported by the fill query. Read-only to the engine. */
export interface FillRecord {
	readonly symbol: Ticker;
	readonly side: FillSide;
	readonly quantity: Decimal;
	readonly price: Decimal;
	/** Null when the broker omitted or garbled the execution time */
	readonly executedAtMs: number | null;
	readonly orderRef: OrderRef;
}

/** The entry or exit order a fill is being looked for. */
export interface MatchTarget {
	readonly symbol: Ticker;
	readonly side: FillSide;
	readonly intendedPrice: Decimal;
	readonly window: TimeWindow | null;
	/** Fills with a known execution time before this are never candidates */
	readonly notBeforeMs?: number;
}

export type MatchedConfidence = Exclude<MatchConfidence, "unmatched">;

export type MatchResult =
	| {
			readonly type: "matched";
			readonly fill: FillRecord;
			readonly confidence: MatchedConfidence;
	  }
	| { readonly type: "no_candidate"; readonly reason: string }
	| { readonly type: "ambiguous"; readonly candidates: readonly FillRecord[] };
