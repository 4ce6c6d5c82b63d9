import { describe, expect, it } from "vitest";
import { Decimal, percentOf, relativeDeviationPct } from "./decimal.js";

const d = (v: string) => Decimal.from(v);

describe("Decimal facade", () => {
	it("is the library decimal", () => {
		expect(d("0.1").add(d("0.2")).toString()).toBe("0.3");
		expect(Decimal.sum([d("100.25"), d("-0.25")]).toString()).toBe("100");
	});

	describe("percentOf", () => {
		it("applies a percentage given as a plain number", () => {
			expect(percentOf(d("100000"), 1).toString()).toBe("1000");
			expect(percentOf(d("250"), 0.5).toString()).toBe("1.25");
			expect(percentOf(d("42"), 0).toString()).toBe("0");
		});
	});

	describe("relativeDeviationPct", () => {
		it("measures the distance from the reference as a percentage", () => {
			expect(relativeDeviationPct(d("102"), d("100"))?.toString()).toBe("2");
			expect(relativeDeviationPct(d("98.5"), d("100"))?.toString()).toBe("1.5");
			expect(relativeDeviationPct(d("-5"), d("-4"))?.toString()).toBe("25");
		});

		it("is null against a zero reference", () => {
			expect(relativeDeviationPct(d("1"), d("0"))).toBeNull();
		});
	});
});
