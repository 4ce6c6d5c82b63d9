/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, preventing accidental
 * mixing (e.g., passing an OrderRef where a PositionId is expected).
 */

import { randomBytes } from "node:crypto";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Opaque position identifier, stable for the position's lifetime and never reused. */
export type PositionId = Brand<string, "PositionId">;
/** Broker order reference carried on a fill record. */
export type OrderRef = Brand<string, "OrderRef">;
/** Instrument ticker as understood by the market data provider and the broker. */
export type Ticker = Brand<string, "Ticker">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated PositionId from a raw string. Throws if empty. */
export function positionId(value: string): PositionId {
	return createBrandedId(value, "PositionId");
}

/** Create a validated OrderRef from a raw string. Throws if empty. */
export function orderRef(value: string): OrderRef {
	return createBrandedId(value, "OrderRef");
}

/** Create a validated, upper-cased Ticker from a raw string. Throws if empty. */
export function ticker(value: string): Ticker {
	return createBrandedId(value.toUpperCase(), "Ticker");
}

/**
 * Mint a fresh position id: `<ticker>-s<system>-<direction>-<base36 ms>-<random>`.
 * The random suffix keeps ids unique even for two signals in the same millisecond.
 */
export function newPositionId(
	symbol: Ticker,
	system: number,
	direction: string,
	nowMs: number,
): PositionId {
	const suffix = randomBytes(4).toString("hex");
	return positionId(`${symbol}-s${system}-${direction}-${nowMs.toString(36)}-${suffix}`);
}

// ── Utility: extract raw string ──────────────────────────────────────

/** Extract the raw string from any branded identifier type. */
export function idToString(id: PositionId | OrderRef | Ticker): string {
	return id as string;
}
