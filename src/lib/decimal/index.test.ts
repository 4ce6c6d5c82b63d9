import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

const dec = (v: string) => LibDecimal.from(v);

describe("LibDecimal", () => {
	describe("parsing", () => {
		it("accepts price literals and finite numbers", () => {
			expect(dec("101.25").toString()).toBe("101.25");
			expect(dec(" 0.001 ").toString()).toBe("0.001");
			expect(dec("1e3").toString()).toBe("1000");
			expect(LibDecimal.from(2.5).toString()).toBe("2.5");
		});

		it("rejects blanks, garbage and non-finite numbers", () => {
			expect(() => dec("")).toThrow("empty string");
			expect(() => dec("12,5")).toThrow('not a decimal "12,5"');
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid number NaN");
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number Infinity");
		});

		it("reports which strings it would accept", () => {
			expect(LibDecimal.isDecimalString("-.5")).toBe(true);
			expect(LibDecimal.isDecimalString("4.")).toBe(true);
			expect(LibDecimal.isDecimalString("N/A")).toBe(false);
		});
	});

	describe("stop and trigger arithmetic", () => {
		it("keeps a 2N stop exact where floats drift", () => {
			const entry = dec("100.1");
			const n = dec("0.2");
			expect(entry.sub(n.mul(dec("2"))).toString()).toBe("99.7");
			expect(dec("0.1").add(dec("0.2")).toString()).toBe("0.3");
		});

		it("divides risk budgets and refuses a zero divisor", () => {
			expect(dec("2500").div(dec("4")).toString()).toBe("625");
			expect(dec("1").div(dec("3")).toFixed(6)).toBe("0.333333");
			expect(() => dec("2500").div(LibDecimal.zero())).toThrow("division by zero");
		});

		it("handles signs for short positions", () => {
			expect(dec("95").sub(dec("100")).mul(dec("-10")).toString()).toBe("50");
			expect(dec("-3").abs().toString()).toBe("3");
			expect(dec("0").neg().isZero()).toBe(true);
			expect(dec("0").neg().toString()).toBe("0");
		});
	});

	describe("comparison", () => {
		it("orders values", () => {
			const stop = dec("96");
			const price = dec("95.99");
			expect(price.lt(stop)).toBe(true);
			expect(price.lte(stop)).toBe(true);
			expect(stop.gt(price)).toBe(true);
			expect(stop.gte(dec("96.00"))).toBe(true);
			expect(stop.eq(dec("96.00"))).toBe(true);
			expect(price.cmp(stop)).toBe(-1);
			expect(stop.cmp(price)).toBe(1);
			expect(stop.cmp(dec("96"))).toBe(0);
		});

		it("classifies sign", () => {
			expect(LibDecimal.zero().isZero()).toBe(true);
			expect(dec("0.01").isPositive()).toBe(true);
			expect(dec("-0.01").isNegative()).toBe(true);
			expect(LibDecimal.zero().isPositive()).toBe(false);
		});

		it("min and max keep the first argument on ties", () => {
			const a = dec("97");
			const b = dec("97.0");
			expect(LibDecimal.max(a, b)).toBe(a);
			expect(LibDecimal.min(dec("96"), dec("97")).toString()).toBe("96");
		});
	});

	describe("rounding and output", () => {
		it("floors unit sizes toward negative infinity", () => {
			expect(dec("416.66").floor().toString()).toBe("416");
			expect(dec("-2.01").floor().toString()).toBe("-3");
		});

		it("rounds half-up", () => {
			expect(dec("1.005").round(2).toString()).toBe("1.01");
			expect(dec("1.004").round(2).toString()).toBe("1");
		});

		it("strips trailing zeros except in toFixed", () => {
			expect(dec("101.500").toString()).toBe("101.5");
			expect(dec("2.00").toString()).toBe("2");
			expect(dec("1.2").toFixed(4)).toBe("1.2000");
			expect(dec("-42.5").toNumber()).toBe(-42.5);
		});

		it("sums to zero when empty", () => {
			expect(LibDecimal.sum([]).toString()).toBe("0");
			expect(LibDecimal.sum([dec("150"), dec("-46.5")]).toString()).toBe("103.5");
		});

		it("serializes to its canonical string in JSON", () => {
			expect(JSON.stringify({ stopLoss: dec("96.20") })).toBe('{"stopLoss":"96.2"}');
		});
	});
});
