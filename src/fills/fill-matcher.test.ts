import { describe, expect, it } from "vitest";
import { T0, d } from "../position/position-test-helpers.js";
import { FillSide } from "../shared/direction.js";
import { orderRef, ticker } from "../shared/identifiers.js";
import { FillMatcher } from "./fill-matcher.js";
import type { FillRecord, MatchTarget } from "./types.js";

const MIN = 60_000;

function fill(
	ref: string,
	price: string,
	executedAtMs: number | null,
	overrides: { side?: FillSide; symbol?: string } = {},
): FillRecord {
	return {
		symbol: ticker(overrides.symbol ?? "AAPL"),
		side: overrides.side ?? FillSide.Buy,
		quantity: d("10"),
		price: d(price),
		executedAtMs,
		orderRef: orderRef(ref),
	};
}

const target: MatchTarget = {
	symbol: ticker("AAPL"),
	side: FillSide.Buy,
	intendedPrice: d("100"),
	window: { startMs: T0, endMs: T0 + 60 * MIN },
};

const refOf = (result: ReturnType<FillMatcher["match"]>) =>
	result.type === "matched" ? result.fill.orderRef : null;

describe("FillMatcher", () => {
	const matcher = new FillMatcher({ timeToleranceMs: 30 * MIN, maxPriceDeviationPct: 2 });

	describe("candidate filtering", () => {
		it("finds nothing when symbol or side differ", () => {
			const result = matcher.match(target, [
				fill("a", "100", T0, { symbol: "MSFT" }),
				fill("b", "100", T0, { side: FillSide.Sell }),
			]);

			expect(result).toEqual({ type: "no_candidate", reason: "no buy fill for AAPL" });
		});

		it("matches a single candidate exactly, with or without a time", () => {
			const result = matcher.match(target, [fill("a", "104", null)]);

			expect(result.type).toBe("matched");
			if (result.type === "matched") expect(result.confidence).toBe("exact");
			expect(refOf(result)).toBe("a");
		});

		it("skips order refs already consumed elsewhere", () => {
			const result = matcher.match(
				target,
				[fill("a", "100", T0 + MIN), fill("b", "100.2", T0 + 2 * MIN)],
				new Set(["b"]),
			);

			expect(refOf(result)).toBe("a");
		});

		it("ignores fills executed before the target existed", () => {
			const result = matcher.match({ ...target, notBeforeMs: T0 }, [
				fill("old", "100", T0 - 5 * MIN),
				fill("new", "101", T0 + 5 * MIN),
			]);

			expect(result.type === "matched" && result.confidence).toBe("exact");
			expect(refOf(result)).toBe("new");
		});
	});

	describe("time filtering", () => {
		it("picks the most recent fill inside the tolerant window", () => {
			const result = matcher.match(target, [
				fill("a", "100.5", T0 + 10 * MIN),
				fill("b", "101", T0 + 20 * MIN),
				fill("late", "100", T0 + 5 * 60 * MIN),
			]);

			expect(result.type === "matched" && result.confidence).toBe("time_filtered");
			expect(refOf(result)).toBe("b");
		});

		it("accepts fills inside the tolerance just past the window", () => {
			const result = matcher.match(target, [
				fill("a", "100", T0 - 40 * MIN),
				fill("b", "100", T0 + 60 * MIN + 30 * MIN),
			]);

			expect(refOf(result)).toBe("b");
		});

		it("matches identical timestamps on the window boundary by closest price", () => {
			const result = matcher.match(target, [
				fill("a", "100.4", T0 + 60 * MIN),
				fill("b", "100.1", T0 + 60 * MIN),
			]);

			expect(result.type).toBe("matched");
			expect(refOf(result)).toBe("b");
		});

		it("falls back to broker order when time and price are both identical", () => {
			const result = matcher.match(target, [
				fill("first", "100", T0 + 60 * MIN),
				fill("second", "100", T0 + 60 * MIN),
			]);

			expect(result.type).toBe("matched");
			expect(refOf(result)).toBe("first");
		});

		it("reports no candidate when every timed fill is out of range", () => {
			const result = matcher.match(target, [
				fill("a", "100", T0 - 2 * 60 * MIN),
				fill("b", "100", T0 + 3 * 60 * MIN),
			]);

			expect(result).toEqual({ type: "no_candidate", reason: "no fill inside the time window" });
		});
	});

	describe("price-only fallback", () => {
		it("uses price proximity when the target has no window", () => {
			const result = matcher.match({ ...target, window: null }, [
				fill("a", "100.5", T0),
				fill("b", "99.8", T0 + MIN),
			]);

			expect(result.type === "matched" && result.confidence).toBe("price_only");
			expect(refOf(result)).toBe("b");
		});

		it("uses price proximity when no fill carries a usable time", () => {
			const result = matcher.match(target, [
				fill("a", "101", null),
				fill("b", "100.3", Number.NaN),
			]);

			expect(result.type === "matched" && result.confidence).toBe("price_only");
			expect(refOf(result)).toBe("b");
		});

		it("rejects fills beyond the allowed price deviation", () => {
			const result = matcher.match({ ...target, window: null }, [
				fill("a", "103", T0),
				fill("b", "97", T0),
			]);

			expect(result).toEqual({ type: "no_candidate", reason: "no fill within 2% of 100" });
		});

		it("breaks a price tie by the most recent execution time", () => {
			const result = matcher.match({ ...target, window: null }, [
				fill("a", "100.5", T0 + MIN),
				fill("b", "99.5", T0 + 2 * MIN),
			]);

			expect(refOf(result)).toBe("b");
		});

		it("reports a price tie that no time can break as ambiguous", () => {
			const a = fill("a", "100.5", null);
			const b = fill("b", "99.5", T0);

			const result = matcher.match({ ...target, window: null }, [a, b, fill("c", "101", null)]);

			expect(result).toEqual({ type: "ambiguous", candidates: [a, b] });
		});
	});
});
