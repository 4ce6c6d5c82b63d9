/**
 * Direction: long/short semantics shared by sizing, stops and pyramiding.
 *
 * "Favorable" always means the direction in which the position makes money:
 * up for long, down for short.
 */

import { Decimal } from "./decimal.js";

/** Position direction. */
export const Direction = {
	Long: "long",
	Short: "short",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/** Broker-side order side. */
export const FillSide = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type FillSide = (typeof FillSide)[keyof typeof FillSide];

/** Order side that adds to a position in the given direction. */
export function entrySide(direction: Direction): FillSide {
	return direction === Direction.Long ? FillSide.Buy : FillSide.Sell;
}

/** Order side that flattens a position in the given direction. */
export function exitSide(direction: Direction): FillSide {
	return direction === Direction.Long ? FillSide.Sell : FillSide.Buy;
}

/** Move `price` by `distance` in the favorable direction. */
export function favorableOffset(direction: Direction, price: Decimal, distance: Decimal): Decimal {
	return direction === Direction.Long ? price.add(distance) : price.sub(distance);
}

/** Move `price` by `distance` against the position (where its protective stop sits). */
export function adverseOffset(direction: Direction, price: Decimal, distance: Decimal): Decimal {
	return direction === Direction.Long ? price.sub(distance) : price.add(distance);
}

/** True if `price` is at or beyond `level` in the favorable direction. */
export function reachedFavorably(direction: Direction, price: Decimal, level: Decimal): boolean {
	return direction === Direction.Long ? price.gte(level) : price.lte(level);
}

/** True if `price` has touched or crossed a protective stop. */
export function stopBreached(direction: Direction, price: Decimal, stop: Decimal): boolean {
	return direction === Direction.Long ? price.lte(stop) : price.gte(stop);
}

/**
 * Combine an existing stop with a candidate, keeping whichever protects more.
 * Long stops only move up, short stops only move down.
 */
export function tightenStop(direction: Direction, current: Decimal, candidate: Decimal): Decimal {
	return direction === Direction.Long
		? Decimal.max(current, candidate)
		: Decimal.min(current, candidate);
}

/** Signed P&L of moving from `entry` to `exit` on `quantity` shares. */
export function directionalPnl(
	direction: Direction,
	entry: Decimal,
	exit: Decimal,
	quantity: Decimal,
): Decimal {
	const perShare = direction === Direction.Long ? exit.sub(entry) : entry.sub(exit);
	return perShare.mul(quantity);
}
