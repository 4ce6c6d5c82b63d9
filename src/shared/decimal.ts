/**
 * Decimal: safe financial math facade.
 *
 * Prices, N values, stops, exposure and P&L MUST use Decimal.
 * Never use raw `number` for money; integer unit counts are plain numbers.
 */

import { LibDecimal } from "../lib/decimal/index.js";

export { LibDecimal as Decimal };

/** Percentage expressed as a plain number (e.g. 2 for 2 %) applied to a decimal. */
export function percentOf(value: LibDecimal, pct: number): LibDecimal {
	return value.mul(LibDecimal.from(pct)).div(LibDecimal.from(100));
}

/** `|a - b| / |b|` as a percentage; null when `b` is zero. */
export function relativeDeviationPct(a: LibDecimal, b: LibDecimal): LibDecimal | null {
	if (b.isZero()) return null;
	return a.sub(b).abs().div(b.abs()).mul(LibDecimal.from(100));
}
