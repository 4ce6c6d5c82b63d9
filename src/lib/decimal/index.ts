/**
 * LibDecimal: domain-agnostic wrapper around decimal.js-light.
 *
 * Prices, ATR values, exposure and P&L all go through this type so that
 * "is the price at least entry + 0.5N" never suffers from IEEE 754 drift.
 * Domain code uses it through the shared/decimal facade and never imports
 * decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or not a decimal literal (for strings)
	 * @example LibDecimal.from("123.45")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		if (!DECIMAL_PATTERN.test(trimmed)) {
			throw new Error(`LibDecimal.from: not a decimal "${trimmed}"`);
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	/** True when `value` is a string `from` would accept. */
	static isDecimalString(value: string): boolean {
		return DECIMAL_PATTERN.test(value.trim());
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	/** Smaller of two values (returns `a` on ties). */
	static min(a: LibDecimal, b: LibDecimal): LibDecimal {
		return b.lt(a) ? b : a;
	}

	/** Larger of two values (returns `a` on ties). */
	static max(a: LibDecimal, b: LibDecimal): LibDecimal {
		return b.gt(a) ? b : a;
	}

	/** Sum of a list, zero when empty. */
	static sum(values: readonly LibDecimal[]): LibDecimal {
		return values.reduce((acc, v) => acc.add(v), LibDecimal.zero());
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/**
	 * Divides this value by another LibDecimal (immutable).
	 * @throws Error if dividing by zero
	 */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	/** Truncates toward negative infinity to a whole number. */
	floor(): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(0, DecimalLight.ROUND_FLOOR));
	}

	/** Rounds half-up to the given number of decimal places. */
	round(places: number): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(places, DecimalLight.ROUND_HALF_UP));
	}

	// ── Comparison ─────────────────────────────────────────────────

	/** @returns -1 if this < other, 0 if equal, 1 if this > other */
	cmp(other: LibDecimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Canonical string form with trailing zeros removed.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/** Fixed-point string with exactly `places` decimals. */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Converts to a JavaScript number. Display and integer counts only. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	toJSON(): string {
		return this.toString();
	}
}
