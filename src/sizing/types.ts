/**
 * Unit sizing types.
 *
 * A Turtle unit is the quantity whose one-N move costs `riskPerUnitPct`
 * of account equity.
 */

import type { Decimal } from "../shared/decimal.js";

export interface UnitSizingInput {
	readonly equity: Decimal;
	readonly n: Decimal;
	/** Currency value of a one-point move per contract or share */
	readonly pointValue: Decimal;
}

export interface UnitSizingResult {
	/** Whole contracts or shares; zero when N or equity is not positive */
	readonly quantity: Decimal;
	/** Equity risked per unit */
	readonly riskBudget: Decimal;
	/** N × point value: what one unit of quantity moves per N */
	readonly dollarVolatility: Decimal;
}

export interface UnitSizer {
	readonly name: string;
	size(input: UnitSizingInput): UnitSizingResult;
}
